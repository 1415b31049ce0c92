/**
 * Registry: creates and authorizes project instances, owns the global donation
 * ledger and leaderboard, and administers fee, treasury, pause flag, asset
 * allowlist and roles.
 */
import { v4 as uuidv4 } from 'uuid';
import { TieredBadgeIssuer } from '../collaborators/badge-issuer.js';
import { ConsoleProjection } from '../collaborators/projection.js';
import { LEDGER_CONFIG } from '../config.js';
import {
  allowedAssetExists,
  countGlobalDonors,
  deleteAllowedAsset,
  deleteRole,
  ensurePlatformState,
  getGlobalDonor,
  getPlatformState,
  insertAllowedAsset,
  insertKnownAdmin,
  insertRole,
  knownAdminExists,
  listAllowedAssets,
  listGlobalDonors,
  listHeldAssets,
  listProjectAddresses,
  roleExists,
  runInTransaction,
  updatePlatformState,
  upsertGlobalDonor,
} from '../database.js';
import { logLedgerEvent } from '../services/logging.js';
import {
  NATIVE_ASSET,
  Role,
  systemClock,
  type AssetTransferProvider,
  type BadgeIssuer,
  type Clock,
  type GlobalStats,
  type Identity,
  type Leaderboard,
  type PlatformContext,
  type ProjectionSink,
} from '../types/ledger.js';
import { LedgerAssetProvider } from './asset-provider.js';
import { commitThenFlush } from './deferred-effects.js';
import { LedgerError, assertIdentity, assertPositiveAmount } from './errors.js';
import { rankDonors, sliceLeaderboard } from './leaderboard.js';
import { ProjectInstance } from './project.js';

/** Builds an uninitialized instance bound to `platform` at `address` */
export type ProjectTemplate = (address: Identity, platform: PlatformContext, clock: Clock) => ProjectInstance;

export const defaultProjectTemplate: ProjectTemplate = (address, platform, clock) =>
  new ProjectInstance(address, platform, { clock });

export interface RegistryOptions {
  identity?: Identity;
  bootstrapAdmin?: Identity;
  treasury?: Identity;
  defaultFeeBps?: number;
  template?: ProjectTemplate;
  projection?: ProjectionSink;
  badgeIssuer?: BadgeIssuer;
  /** External providers are not persisted; pass them here so they serve projects loaded at startup */
  assetProviders?: AssetTransferProvider[];
  clock?: Clock;
}

export function isRole(value: unknown): value is Role {
  return Object.values(Role).some(role => role === value);
}

function assertFeeBps(feeBps: number): void {
  if (!Number.isInteger(feeBps) || feeBps < 0) {
    throw new LedgerError('InvalidAmount', 'Fee must be a non-negative integer number of basis points', { feeBps });
  }
  if (feeBps > LEDGER_CONFIG.maxFeeBps) {
    throw new LedgerError('FeeExceedsCeiling', `Fee ${feeBps} bps exceeds the ${LEDGER_CONFIG.maxFeeBps} bps ceiling`, {
      feeBps,
      ceiling: LEDGER_CONFIG.maxFeeBps,
    });
  }
}

function assertRange(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LedgerError('InvalidAmount', `${field} must be a non-negative integer`, { field, value });
  }
}

export class Registry implements PlatformContext {
  readonly identity: Identity;
  private readonly projects: Map<number, ProjectInstance> = new Map();
  private readonly providers: Map<string, AssetTransferProvider> = new Map();
  private readonly projection: ProjectionSink;
  private readonly badgeIssuer: BadgeIssuer;
  private readonly clock: Clock;
  private template: ProjectTemplate;

  constructor(options: RegistryOptions = {}) {
    this.identity = options.identity ?? LEDGER_CONFIG.registryIdentity;
    this.clock = options.clock ?? systemClock;
    this.template = options.template ?? defaultProjectTemplate;
    this.projection = options.projection ?? new ConsoleProjection();
    this.badgeIssuer = options.badgeIssuer ?? new TieredBadgeIssuer(this.clock);

    const bootstrapAdmin = options.bootstrapAdmin ?? LEDGER_CONFIG.bootstrapAdmin;
    const treasury = options.treasury ?? LEDGER_CONFIG.treasury;
    const feeBps = options.defaultFeeBps ?? LEDGER_CONFIG.defaultFeeBps;
    assertIdentity(this.identity, 'identity');
    assertIdentity(bootstrapAdmin, 'bootstrapAdmin');
    assertIdentity(treasury, 'treasury');
    assertFeeBps(feeBps);

    runInTransaction(() => {
      if (!ensurePlatformState(feeBps, treasury)) return;
      const at = this.now();
      insertRole(bootstrapAdmin, Role.PlatformAdmin, at);
      insertRole(bootstrapAdmin, Role.ProjectCreator, at);
      console.log(`[Registry] Bootstrapped platform state (admin=${bootstrapAdmin}, fee=${feeBps} bps)`);
    });

    for (const provider of options.assetProviders ?? []) {
      this.registerAssetProvider(provider.assetId, provider);
    }
    // Assets dropped from the allowlist still need a provider to release what projects hold.
    for (const assetId of [NATIVE_ASSET, ...listAllowedAssets(), ...listHeldAssets()]) {
      if (!this.providers.has(assetId)) {
        this.providers.set(assetId, new LedgerAssetProvider(assetId));
      }
    }

    for (const row of listProjectAddresses()) {
      if (row.registry_address === this.identity) {
        this.projects.set(row.project_id, this.template(row.address, this, this.clock));
      }
    }
    if (this.projects.size > 0) {
      console.log(`[Registry] Loaded ${this.projects.size} project instances`);
    }
  }

  // ==========================================================================
  // PROJECTS
  // ==========================================================================

  createProject(caller: Identity, admin: Identity, fundingGoal: bigint, metadataRef: string): number {
    const created: { projectId?: number } = {};
    try {
      return commitThenFlush(effects => {
        this.requireRole(caller, Role.ProjectCreator);
        const state = getPlatformState();
        if (state.paused) {
          throw new LedgerError('RegistryPaused', 'Project creation is paused');
        }
        assertIdentity(admin, 'admin');
        assertPositiveAmount(fundingGoal, 'fundingGoal');

        const projectId = state.next_project_id;
        const address = `project:${uuidv4()}`;
        const instance = this.template(address, this, this.clock);
        if (instance.address !== address || instance.isInitialized() || this.isRegisteredAddress(instance.address)) {
          throw new LedgerError('TemplateMisconfigured', 'Project template did not produce a fresh instance', {
            expected: address,
            received: instance.address,
          });
        }

        instance.initialize(this.identity, projectId, admin, fundingGoal, metadataRef);
        updatePlatformState({ next_project_id: projectId + 1 });

        const at = this.now();
        if (insertKnownAdmin(admin, at)) {
          console.log(`[Registry] New project admin: ${admin}`);
        }
        logLedgerEvent('ProjectCreated', projectId, {
          address,
          admin,
          fundingGoal: fundingGoal.toString(),
          metadataRef,
          creator: caller,
        }, this.clock.now());

        this.projects.set(projectId, instance);
        created.projectId = projectId;

        effects.defer('projection notification', () => this.projection.projectCreated(projectId));
        return projectId;
      });
    } catch (error) {
      if (created.projectId !== undefined) {
        this.projects.delete(created.projectId);
      }
      throw error;
    }
  }

  getProject(projectId: number): ProjectInstance {
    const instance = this.projects.get(projectId);
    if (!instance) {
      throw new LedgerError('UnknownProjectId', `No project with id ${projectId}`, { projectId });
    }
    return instance;
  }

  listProjectIds(): number[] {
    return Array.from(this.projects.keys()).sort((a, b) => a - b);
  }

  isKnownAdmin(identity: Identity): boolean {
    return knownAdminExists(identity);
  }

  setProjectTemplate(caller: Identity, template: ProjectTemplate): void {
    this.requireRole(caller, Role.PlatformAdmin);
    this.template = template;
    console.log(`[Registry] Project template replaced by ${caller}`);
  }

  // ==========================================================================
  // GLOBAL LEDGER
  // ==========================================================================

  recordDonation(caller: Identity, donor: Identity, projectId: number, amount: bigint): void {
    runInTransaction(() => {
      const instance = this.getProject(projectId);
      if (caller !== instance.address) {
        throw new LedgerError('Unauthorized', `${caller} is not the instance registered as project ${projectId}`, { projectId });
      }
      assertIdentity(donor, 'donor');
      assertPositiveAmount(amount, 'amount');

      const existing = getGlobalDonor(donor);
      const total = (existing ? BigInt(existing.total) : 0n) + amount;
      upsertGlobalDonor(donor, total.toString(), this.now());

      const state = getPlatformState();
      updatePlatformState({
        donation_count: state.donation_count + 1,
        total_raised: (BigInt(state.total_raised) + amount).toString(),
      });
    });
  }

  getLeaderboard(start: number, end: number): Leaderboard {
    assertRange(start, 'start');
    assertRange(end, 'end');
    const entries = listGlobalDonors().map(row => ({ donor: row.donor, amount: BigInt(row.total) }));
    return sliceLeaderboard(rankDonors(entries), start, end);
  }

  getGlobalDonorTotal(donor: Identity): bigint {
    const row = getGlobalDonor(donor);
    return row ? BigInt(row.total) : 0n;
  }

  getDonorCount(): number {
    return countGlobalDonors();
  }

  getGlobalStats(): GlobalStats {
    const state = getPlatformState();
    return {
      donorCount: countGlobalDonors(),
      donationCount: state.donation_count,
      totalRaised: BigInt(state.total_raised),
    };
  }

  // ==========================================================================
  // ASSETS
  // ==========================================================================

  /** Allowlisted assets default to ledger-backed accounts; this installs an external provider instead */
  registerAssetProvider(assetId: string, provider: AssetTransferProvider): void {
    if (provider.assetId !== assetId) {
      throw new LedgerError('InvalidReference', `Provider for ${provider.assetId} cannot serve ${assetId}`, { assetId });
    }
    this.providers.set(assetId, provider);
  }

  getAssetProvider(assetId: string): AssetTransferProvider {
    const provider = this.providers.get(assetId);
    if (!provider) {
      throw new LedgerError('AssetNotAllowed', `No transfer provider registered for ${assetId}`, { assetId });
    }
    return provider;
  }

  /** The ledger-backed provider for `assetId`, or null when the asset is served externally */
  getLedgerAsset(assetId: string): LedgerAssetProvider | null {
    const provider = this.providers.get(assetId);
    return provider instanceof LedgerAssetProvider ? provider : null;
  }

  isAssetAllowed(assetId: string): boolean {
    if (assetId === NATIVE_ASSET) return true;
    if (getPlatformState().allow_all_assets) return true;
    return allowedAssetExists(assetId);
  }

  addAllowedAsset(caller: Identity, assetId: string): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      assertIdentity(assetId, 'assetId');
      if (assetId === NATIVE_ASSET) return;
      if (!this.providers.has(assetId)) {
        this.providers.set(assetId, new LedgerAssetProvider(assetId));
      }
      if (insertAllowedAsset(assetId, this.now())) {
        logLedgerEvent('AssetAllowlistChanged', null, { assetId, allowed: true, by: caller }, this.clock.now());
      }
    });
  }

  removeAllowedAsset(caller: Identity, assetId: string): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      if (assetId === NATIVE_ASSET) {
        throw new LedgerError('InvalidReference', 'The native asset is always allowed');
      }
      if (deleteAllowedAsset(assetId)) {
        logLedgerEvent('AssetAllowlistChanged', null, { assetId, allowed: false, by: caller }, this.clock.now());
      }
    });
  }

  setAllowAllAssets(caller: Identity, enabled: boolean): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      updatePlatformState({ allow_all_assets: enabled });
      logLedgerEvent('AssetAllowlistChanged', null, { assetId: '*', allowed: enabled, by: caller }, this.clock.now());
    });
  }

  listAllowedAssets(): string[] {
    return listAllowedAssets();
  }

  isAllowAllAssets(): boolean {
    return getPlatformState().allow_all_assets;
  }

  // ==========================================================================
  // PLATFORM SETTINGS
  // ==========================================================================

  getFeeBps(): number {
    return getPlatformState().fee_bps;
  }

  setFeeBps(caller: Identity, feeBps: number): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      assertFeeBps(feeBps);
      const previous = getPlatformState().fee_bps;
      updatePlatformState({ fee_bps: feeBps });
      logLedgerEvent('FeeUpdated', null, { previous, feeBps, by: caller }, this.clock.now());
    });
  }

  getTreasury(): Identity {
    return getPlatformState().treasury;
  }

  setTreasury(caller: Identity, treasury: Identity): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      assertIdentity(treasury, 'treasury');
      updatePlatformState({ treasury });
      logLedgerEvent('TreasuryUpdated', null, { treasury, by: caller }, this.clock.now());
    });
  }

  isPaused(): boolean {
    return getPlatformState().paused;
  }

  pause(caller: Identity): void {
    this.setPaused(caller, true);
  }

  unpause(caller: Identity): void {
    this.setPaused(caller, false);
  }

  private setPaused(caller: Identity, paused: boolean): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      updatePlatformState({ paused });
      logLedgerEvent('PauseToggled', null, { paused, by: caller }, this.clock.now());
    });
  }

  // ==========================================================================
  // ROLES
  // ==========================================================================

  hasRole(identity: Identity, role: Role): boolean {
    return roleExists(identity, role);
  }

  grantRole(caller: Identity, identity: Identity, role: Role): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      assertIdentity(identity, 'identity');
      if (!isRole(role)) {
        throw new LedgerError('InvalidReference', `Unknown role: ${String(role)}`);
      }
      if (insertRole(identity, role, this.now())) {
        logLedgerEvent('RoleChanged', null, { identity, role, granted: true, by: caller }, this.clock.now());
      }
    });
  }

  revokeRole(caller: Identity, identity: Identity, role: Role): void {
    runInTransaction(() => {
      this.requireRole(caller, Role.PlatformAdmin);
      if (!isRole(role)) {
        throw new LedgerError('InvalidReference', `Unknown role: ${String(role)}`);
      }
      if (deleteRole(identity, role)) {
        logLedgerEvent('RoleChanged', null, { identity, role, granted: false, by: caller }, this.clock.now());
      }
    });
  }

  // ==========================================================================
  // BADGES
  // ==========================================================================

  /** Called by an operator once badge metadata is prepared off-ledger */
  triggerBadgeMint(caller: Identity, donor: Identity, projectId: number, metadataRef: string): number {
    return runInTransaction(() => {
      if (!this.hasRole(caller, Role.BadgeOperator) && !this.hasRole(caller, Role.PlatformAdmin)) {
        throw new LedgerError('Unauthorized', `${caller} may not trigger badge mints`);
      }
      assertIdentity(donor, 'donor');
      const amount = this.getProject(projectId).getDonorTotal(donor);
      if (amount === 0n) {
        throw new LedgerError('NoRecordedDonation', `${donor} has no recorded donation to project ${projectId}`, { donor, projectId });
      }

      const badgeId = this.badgeIssuer.mint(donor, projectId, amount, metadataRef);
      logLedgerEvent('BadgeMinted', projectId, { badgeId, donor, amount: amount.toString(), metadataRef }, this.clock.now());
      return badgeId;
    });
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private requireRole(caller: Identity, role: Role): void {
    if (!roleExists(caller, role)) {
      throw new LedgerError('Unauthorized', `${caller} lacks role ${role}`, { role });
    }
  }

  private isRegisteredAddress(address: Identity): boolean {
    return Array.from(this.projects.values()).some(instance => instance.address === address);
  }

  private now(): string {
    return this.clock.now().toISOString();
  }
}
