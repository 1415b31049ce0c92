import { runInTransaction } from '../database.js';

interface DeferredEffect {
  label: string;
  run: () => void;
}

/**
 * Best-effort work queued while a mutating call runs and executed only after
 * that call's transaction has committed. Each effect gets its own transaction;
 * a failure is logged and rolled back on its own, never reaching the caller.
 */
export class DeferredEffects {
  private queue: DeferredEffect[] = [];

  defer(label: string, run: () => void): void {
    this.queue.push({ label, run });
  }

  flush(): void {
    const pending = this.queue;
    this.queue = [];

    for (const effect of pending) {
      try {
        runInTransaction(effect.run);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Ledger] Best-effort ${effect.label} failed: ${reason}`);
      }
    }
  }

  discard(): void {
    this.queue = [];
  }
}

/**
 * Run `body` in a transaction with a fresh effect queue; flush the queue once
 * the transaction commits, drop it if the body throws.
 */
export function commitThenFlush<T>(body: (effects: DeferredEffects) => T): T {
  const effects = new DeferredEffects();
  let result: T;
  try {
    result = runInTransaction(() => body(effects));
  } catch (error) {
    effects.discard();
    throw error;
  }
  effects.flush();
  return result;
}
