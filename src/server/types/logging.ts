import type { Identity } from './ledger.js';

// Request metadata attached by middleware
export interface RequestMetadata {
  session_id: string;
  ip_address: string;
  user_agent: string;
  // Set by the upstream gateway after it authenticates the caller
  caller: Identity | null;
}
