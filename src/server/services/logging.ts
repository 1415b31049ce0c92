import { insertLedgerEvent } from '../database.js';

export type LedgerEventType =
  | 'ProjectCreated'
  | 'DonationReceived'
  | 'StatusChanged'
  | 'FundsReleased'
  | 'EvidenceSubmitted'
  | 'DonorRefunded'
  | 'AllDonorsRefunded'
  | 'FeeUpdated'
  | 'TreasuryUpdated'
  | 'PauseToggled'
  | 'AssetAllowlistChanged'
  | 'RoleChanged'
  | 'BadgeMinted';

type EventPayload = Record<string, string | number | boolean | null>;

/**
 * Persist a ledger event and echo it to the console.
 * Called inside the caller's transaction, so a failed call leaves no event behind.
 */
export function logLedgerEvent(
  eventType: LedgerEventType,
  projectId: number | null,
  payload: EventPayload,
  at: Date = new Date()
): number {
  const id = insertLedgerEvent({
    project_id: projectId,
    event_type: eventType,
    payload_json: JSON.stringify(payload),
    created_at: at.toISOString(),
  });

  const scope = projectId === null ? '[Ledger]' : `[Project ${projectId}]`;
  console.log(`${scope} ${eventType} ${JSON.stringify(payload)}`);
  return id;
}
