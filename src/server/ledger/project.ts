/**
 * Project instance: one funding campaign's escrow and lifecycle.
 *
 * Active --(donation reaches goal)--> Funded --(releaseFunds)--> Completed
 * Active | Funded --(admin updateStatus)--> Cancelled --(refunds)
 *
 * State lives in the ledger database under the instance address; the object
 * holds only its collaborators and the reentrancy guard.
 */
import { LEDGER_CONFIG } from '../config.js';
import {
  clearProjectDonors,
  countEvidence,
  getEvidenceAt,
  getProjectByAddress,
  getProjectDonor,
  insertEvidence,
  insertProject,
  insertProjectAsset,
  listProjectAssets,
  listProjectDonors,
  updateProject,
  upsertProjectDonor,
  type ProjectRecord,
} from '../database.js';
import { logLedgerEvent } from '../services/logging.js';
import {
  NATIVE_ASSET,
  ProjectStatus,
  systemClock,
  type Clock,
  type DonorTotal,
  type EvidenceRecord,
  type Identity,
  type Payout,
  type PlatformContext,
  type ProjectSummary,
  type ReleaseReceipt,
} from '../types/ledger.js';
import { commitThenFlush, type DeferredEffects } from './deferred-effects.js';
import { LedgerError, assertIdentity, assertPositiveAmount } from './errors.js';
import { ReentrancyGuard } from './reentrancy-guard.js';

const MAX_REFERENCE_LENGTH = 256;

export interface ProjectInstanceOptions {
  clock?: Clock;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

export function splitFee(held: bigint, feeBps: number): { fee: bigint; net: bigint } {
  const fee = (held * BigInt(feeBps)) / LEDGER_CONFIG.bpsDenominator;
  return { fee, net: held - fee };
}

export function isProjectStatus(value: unknown): value is ProjectStatus {
  return Object.values(ProjectStatus).some(status => status === value);
}

/**
 * Transitions an admin may request explicitly. Funded is only reachable once the
 * goal is met and Completed only through releaseFunds.
 */
export function checkStatusUpdate(current: ProjectStatus, next: ProjectStatus, goalMet: boolean): void {
  const reject = (reason: string): never => {
    throw new LedgerError('InvalidStatusTransition', `${current} -> ${next}: ${reason}`, { from: current, to: next });
  };

  if (current === ProjectStatus.Completed) reject('project is completed');
  if (current === ProjectStatus.Cancelled) reject('project is cancelled');
  if (next === current) reject('status unchanged');
  if (next === ProjectStatus.Completed) reject('completion happens through releaseFunds');
  if (next === ProjectStatus.Active) reject('a project cannot return to Active');
  if (next === ProjectStatus.Funded && !goalMet) reject('funding goal not reached');
}

function assertReference(value: unknown, field: string): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0 || value.length > MAX_REFERENCE_LENGTH) {
    throw new LedgerError('InvalidReference', `${field} must be a non-empty string of at most ${MAX_REFERENCE_LENGTH} characters`, { field });
  }
}

// ============================================================================
// PROJECT INSTANCE
// ============================================================================

export class ProjectInstance {
  readonly address: Identity;
  private readonly platform: PlatformContext;
  private readonly clock: Clock;
  private readonly guard: ReentrancyGuard;

  constructor(address: Identity, platform: PlatformContext, options: ProjectInstanceOptions = {}) {
    assertIdentity(address, 'address');
    this.address = address;
    this.platform = platform;
    this.clock = options.clock ?? systemClock;
    this.guard = new ReentrancyGuard(address);
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  initialize(caller: Identity, projectId: number, admin: Identity, fundingGoal: bigint, metadataRef: string): void {
    this.mutate('initialize', () => {
      if (getProjectByAddress(this.address)) {
        throw new LedgerError('AlreadyInitialized', `${this.address} is already initialized`);
      }
      if (caller !== this.platform.identity) {
        throw new LedgerError('Unauthorized', `${caller} is not the registry for ${this.address}`);
      }
      if (!Number.isSafeInteger(projectId) || projectId < 1) {
        throw new LedgerError('InvalidAmount', 'projectId must be a positive integer', { projectId });
      }
      assertIdentity(admin, 'admin');
      assertPositiveAmount(fundingGoal, 'fundingGoal');

      insertProject({
        address: this.address,
        project_id: projectId,
        registry_address: caller,
        admin,
        funding_goal: fundingGoal.toString(),
        funds_raised: '0',
        status: ProjectStatus.Active,
        metadata_ref: metadataRef,
        created_at: this.clock.now().toISOString(),
      });
    });
  }

  donate(donor: Identity, amount: bigint): void {
    this.mutate('donate', effects => {
      const project = this.acceptingDonations(donor, amount);
      const provider = this.platform.getAssetProvider(NATIVE_ASSET);
      this.checkedTransfer('native donation', () => provider.transfer(donor, this.address, amount));
      this.credit(project, donor, NATIVE_ASSET, amount, effects);
    });
  }

  donateToken(donor: Identity, assetId: string, amount: bigint): void {
    this.mutate('donateToken', effects => {
      const project = this.acceptingDonations(donor, amount);
      if (!this.platform.isAssetAllowed(assetId)) {
        throw new LedgerError('AssetNotAllowed', `Asset ${assetId} is not on the allowlist`, { assetId });
      }
      const provider = this.platform.getAssetProvider(assetId);
      this.checkedTransfer(`${assetId} donation`, () => provider.transferFrom(this.address, donor, this.address, amount));
      this.credit(project, donor, assetId, amount, effects);
    });
  }

  /** Native funds sent straight to the instance count as a donation from the sender */
  receive(sender: Identity, amount: bigint): void {
    this.donate(sender, amount);
  }

  releaseFunds(caller: Identity): ReleaseReceipt {
    return this.mutate('releaseFunds', () => {
      const project = this.requireRecord();
      this.requireAdmin(project, caller);

      if (project.status === ProjectStatus.Completed) {
        throw new LedgerError('AlreadyReleased', `Project ${project.project_id} has already released its funds`);
      }
      if (project.status === ProjectStatus.Cancelled) {
        throw new LedgerError('InvalidStatusTransition', `Project ${project.project_id} is cancelled`, {
          from: project.status,
          to: ProjectStatus.Completed,
        });
      }
      const fundsRaised = BigInt(project.funds_raised);
      const fundingGoal = BigInt(project.funding_goal);
      if (fundsRaised < fundingGoal) {
        throw new LedgerError('GoalNotReached', `Project ${project.project_id} raised ${fundsRaised} of ${fundingGoal}`, {
          fundsRaised: fundsRaised.toString(),
          fundingGoal: fundingGoal.toString(),
        });
      }

      const feeBps = this.platform.getFeeBps();
      const treasury = this.platform.getTreasury();
      const payouts: Payout[] = [];

      for (const assetId of listProjectAssets(this.address)) {
        const provider = this.platform.getAssetProvider(assetId);
        const held = provider.balanceOf(this.address);
        if (held === 0n) continue;

        const { fee, net } = splitFee(held, feeBps);
        if (fee > 0n) {
          this.checkedTransfer(`${assetId} fee payout`, () => provider.transfer(this.address, treasury, fee));
        }
        if (net > 0n) {
          this.checkedTransfer(`${assetId} admin payout`, () => provider.transfer(this.address, project.admin, net));
        }
        payouts.push({ assetId, held, fee, net });
      }

      updateProject(this.address, { status: ProjectStatus.Completed });
      this.emitStatusChange(project, ProjectStatus.Completed);
      for (const payout of payouts) {
        logLedgerEvent('FundsReleased', project.project_id, {
          assetId: payout.assetId,
          held: payout.held.toString(),
          fee: payout.fee.toString(),
          net: payout.net.toString(),
          admin: project.admin,
          treasury,
        }, this.clock.now());
      }

      return { projectId: project.project_id, admin: project.admin, treasury, feeBps, payouts };
    });
  }

  submitEvidence(caller: Identity, contentHash: string): number {
    return this.mutate('submitEvidence', () => {
      const project = this.requireRecord();
      this.requireAdmin(project, caller);
      assertReference(contentHash, 'contentHash');

      const submittedAt = this.clock.now();
      const index = insertEvidence(this.address, {
        content_hash: contentHash,
        submitted_at: submittedAt.toISOString(),
        submitter: caller,
      });
      logLedgerEvent('EvidenceSubmitted', project.project_id, { index, contentHash, submitter: caller }, submittedAt);
      return index;
    });
  }

  updateStatus(caller: Identity, next: ProjectStatus): void {
    this.mutate('updateStatus', () => {
      const project = this.requireRecord();
      this.requireAdmin(project, caller);
      if (!isProjectStatus(next)) {
        throw new LedgerError('InvalidStatusTransition', `Unknown status: ${String(next)}`);
      }

      const goalMet = BigInt(project.funds_raised) >= BigInt(project.funding_goal);
      checkStatusUpdate(project.status, next, goalMet);

      updateProject(this.address, { status: next });
      this.emitStatusChange(project, next);
    });
  }

  /** Returns the native amount sent back; token contributions stay with the instance */
  refundDonor(caller: Identity, donor: Identity): bigint {
    return this.mutate('refundDonor', () => {
      const project = this.requireRecord();
      this.requireAdmin(project, caller);
      this.requireCancelled(project);
      assertIdentity(donor, 'donor');

      const record = getProjectDonor(this.address, donor);
      const total = record ? BigInt(record.total) : 0n;
      if (!record || total === 0n) {
        throw new LedgerError('NoRecordedDonation', `${donor} has no recorded donation to project ${project.project_id}`, { donor });
      }
      const native = BigInt(record.native_total);

      upsertProjectDonor(this.address, { ...record, total: '0', native_total: '0' });
      updateProject(this.address, { funds_raised: (BigInt(project.funds_raised) - total).toString() });

      if (native > 0n) {
        const provider = this.platform.getAssetProvider(NATIVE_ASSET);
        this.checkedTransfer('native refund', () => provider.transfer(this.address, donor, native));
      }

      logLedgerEvent('DonorRefunded', project.project_id, {
        donor,
        total: total.toString(),
        nativeRefunded: native.toString(),
      }, this.clock.now());
      return native;
    });
  }

  refundAllDonors(caller: Identity): bigint {
    return this.mutate('refundAllDonors', () => {
      const project = this.requireRecord();
      this.requireAdmin(project, caller);
      this.requireCancelled(project);

      const donors = listProjectDonors(this.address);
      const provider = this.platform.getAssetProvider(NATIVE_ASSET);
      let refunded = 0n;

      for (const record of donors) {
        const native = BigInt(record.native_total);
        if (native === 0n) continue;
        this.checkedTransfer('native refund', () => provider.transfer(this.address, record.donor, native));
        refunded += native;
      }

      clearProjectDonors(this.address);
      updateProject(this.address, { funds_raised: '0' });

      logLedgerEvent('AllDonorsRefunded', project.project_id, {
        donorCount: donors.length,
        nativeRefunded: refunded.toString(),
      }, this.clock.now());
      return refunded;
    });
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  isInitialized(): boolean {
    return getProjectByAddress(this.address) !== null;
  }

  getSummary(): ProjectSummary {
    const project = this.requireRecord();
    return {
      projectId: project.project_id,
      address: project.address,
      admin: project.admin,
      fundingGoal: BigInt(project.funding_goal),
      fundsRaised: BigInt(project.funds_raised),
      status: project.status,
      metadataRef: project.metadata_ref,
      donorCount: listProjectDonors(this.address).length,
      evidenceCount: countEvidence(this.address),
      createdAt: project.created_at,
    };
  }

  getProjectId(): number {
    return this.requireRecord().project_id;
  }

  getAdmin(): Identity {
    return this.requireRecord().admin;
  }

  getStatus(): ProjectStatus {
    return this.requireRecord().status;
  }

  getFundingGoal(): bigint {
    return BigInt(this.requireRecord().funding_goal);
  }

  getFundsRaised(): bigint {
    return BigInt(this.requireRecord().funds_raised);
  }

  getDonorTotal(donor: Identity): bigint {
    this.requireRecord();
    const record = getProjectDonor(this.address, donor);
    return record ? BigInt(record.total) : 0n;
  }

  /** Distinct donors in first-donation order */
  getDonors(): Identity[] {
    this.requireRecord();
    return listProjectDonors(this.address).map(record => record.donor);
  }

  getDonorTotals(): DonorTotal[] {
    this.requireRecord();
    return listProjectDonors(this.address).map(record => ({ donor: record.donor, amount: BigInt(record.total) }));
  }

  getEvidenceCount(): number {
    this.requireRecord();
    return countEvidence(this.address);
  }

  getEvidence(index: number): EvidenceRecord {
    this.requireRecord();
    const row = Number.isSafeInteger(index) && index >= 0 ? getEvidenceAt(this.address, index) : null;
    if (!row) {
      throw new LedgerError('InvalidReference', `No evidence at index ${index}`, { index });
    }
    return {
      index: row.evidence_index,
      contentHash: row.content_hash,
      submittedAt: row.submitted_at,
      submitter: row.submitter,
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private mutate<T>(operation: string, body: (effects: DeferredEffects) => T): T {
    return this.guard.run(operation, () => commitThenFlush(body));
  }

  private requireRecord(): ProjectRecord {
    const project = getProjectByAddress(this.address);
    if (!project) {
      throw new LedgerError('NotInitialized', `${this.address} has not been initialized`);
    }
    return project;
  }

  private requireAdmin(project: ProjectRecord, caller: Identity): void {
    if (caller !== project.admin) {
      throw new LedgerError('Unauthorized', `${caller} is not the admin of project ${project.project_id}`);
    }
  }

  private requireCancelled(project: ProjectRecord): void {
    if (project.status !== ProjectStatus.Cancelled) {
      throw new LedgerError('InvalidStatusTransition', `Refunds require Cancelled, project ${project.project_id} is ${project.status}`, {
        status: project.status,
      });
    }
  }

  private acceptingDonations(donor: Identity, amount: bigint): ProjectRecord {
    const project = this.requireRecord();
    assertIdentity(donor, 'donor');
    if (project.status !== ProjectStatus.Active) {
      throw new LedgerError('InvalidStatusTransition', `Project ${project.project_id} is ${project.status} and not accepting donations`, {
        status: project.status,
      });
    }
    if (amount < LEDGER_CONFIG.minDonation) {
      throw new LedgerError('InvalidAmount', `Donation must be at least ${LEDGER_CONFIG.minDonation}`, {
        amount: amount.toString(),
        minimum: LEDGER_CONFIG.minDonation.toString(),
      });
    }
    return project;
  }

  private checkedTransfer(description: string, transfer: () => boolean): void {
    let ok: boolean;
    try {
      ok = transfer();
    } catch (error) {
      throw new LedgerError('TransferFailure', `${description} failed: ${error instanceof Error ? error.message : String(error)}`, {
        project: this.address,
      }, { cause: error });
    }
    if (ok !== true) {
      throw new LedgerError('TransferFailure', `${description} was rejected by the asset provider`, { project: this.address });
    }
  }

  private credit(project: ProjectRecord, donor: Identity, assetId: string, amount: bigint, effects: DeferredEffects): void {
    const existing = getProjectDonor(this.address, donor);
    upsertProjectDonor(this.address, {
      donor,
      total: ((existing ? BigInt(existing.total) : 0n) + amount).toString(),
      native_total: ((existing ? BigInt(existing.native_total) : 0n) + (assetId === NATIVE_ASSET ? amount : 0n)).toString(),
      listed: true,
    });
    insertProjectAsset(this.address, assetId);

    const fundsRaised = BigInt(project.funds_raised) + amount;
    const reachedGoal = project.status === ProjectStatus.Active && fundsRaised >= BigInt(project.funding_goal);
    updateProject(this.address, {
      funds_raised: fundsRaised.toString(),
      ...(reachedGoal ? { status: ProjectStatus.Funded } : {}),
    });

    const at = this.clock.now();
    logLedgerEvent('DonationReceived', project.project_id, {
      donor,
      assetId,
      amount: amount.toString(),
      fundsRaised: fundsRaised.toString(),
    }, at);
    if (reachedGoal) {
      this.emitStatusChange(project, ProjectStatus.Funded);
    }

    const projectId = project.project_id;
    effects.defer('global ledger recording', () => {
      this.platform.recordDonation(this.address, donor, projectId, amount);
    });
  }

  private emitStatusChange(project: ProjectRecord, next: ProjectStatus): void {
    logLedgerEvent('StatusChanged', project.project_id, { from: project.status, to: next }, this.clock.now());
  }
}
