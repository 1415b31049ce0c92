import type { ProjectionSink } from '../types/ledger.js';

/** Default projection: the discovery service tails the server log */
export class ConsoleProjection implements ProjectionSink {
  projectCreated(projectId: number): void {
    console.log(`[Projection] project ${projectId} created`);
  }
}
