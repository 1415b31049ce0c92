// ============================================================================
// LEDGER DOMAIN TYPES
// Shared between the registry, project instances, collaborators and handlers
// ============================================================================

/** Account identifier: donor, admin, treasury, registry or project instance address */
export type Identity = string;

export const NATIVE_ASSET = 'native';

export enum ProjectStatus {
  Active = 'Active',
  Funded = 'Funded',
  Completed = 'Completed',
  Cancelled = 'Cancelled',
}

export enum Role {
  PlatformAdmin = 'platform_admin',
  ProjectCreator = 'project_creator',
  BadgeOperator = 'badge_operator',
}

export interface ProjectSummary {
  projectId: number;
  address: Identity;
  admin: Identity;
  fundingGoal: bigint;
  fundsRaised: bigint;
  status: ProjectStatus;
  metadataRef: string;
  donorCount: number;
  evidenceCount: number;
  createdAt: string;
}

export interface EvidenceRecord {
  index: number;
  contentHash: string;
  submittedAt: string;
  submitter: Identity;
}

export interface DonorTotal {
  donor: Identity;
  amount: bigint;
}

/** Two parallel sequences, same length, ranked by amount */
export interface Leaderboard {
  donors: Identity[];
  amounts: bigint[];
}

export interface GlobalStats {
  donorCount: number;
  donationCount: number;
  totalRaised: bigint;
}

export interface Payout {
  assetId: string;
  held: bigint;
  fee: bigint;
  net: bigint;
}

export interface ReleaseReceipt {
  projectId: number;
  admin: Identity;
  treasury: Identity;
  feeBps: number;
  payouts: Payout[];
}

/**
 * What a project instance needs from the platform that created it.
 * Implemented by Registry; tests may substitute their own.
 */
export interface PlatformContext {
  readonly identity: Identity;
  getFeeBps(): number;
  getTreasury(): Identity;
  isAssetAllowed(assetId: string): boolean;
  getAssetProvider(assetId: string): AssetTransferProvider;
  recordDonation(caller: Identity, donor: Identity, projectId: number, amount: bigint): void;
}

/**
 * Fungible asset movements. `caller` / `spender` is the identity invoking the
 * transfer. Both methods report success through their return value; callers
 * must check it.
 */
export interface AssetTransferProvider {
  readonly assetId: string;
  transfer(caller: Identity, to: Identity, amount: bigint): boolean;
  transferFrom(spender: Identity, from: Identity, to: Identity, amount: bigint): boolean;
  balanceOf(account: Identity): bigint;
}

export interface BadgeIssuer {
  mint(donor: Identity, projectId: number, amount: bigint, metadataRef: string): number;
}

export interface ProjectionSink {
  projectCreated(projectId: number): void;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
