import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeDatabase, getLedgerEvents } from '../src/server/database.js';
import { ProjectInstance, checkStatusUpdate, splitFee } from '../src/server/ledger/project.js';
import type { Registry } from '../src/server/ledger/registry.js';
import { ProjectStatus } from '../src/server/types/ledger.js';
import {
  FIXED_TIME,
  PLATFORM_ADMIN,
  PROJECT_ADMIN,
  TREASURY,
  expectLedgerError,
  fund,
  ledgerAsset,
  setupRegistry,
} from './helpers.js';

describe('ProjectInstance', () => {
  let registry: Registry;
  let project: ProjectInstance;

  beforeEach(() => {
    registry = setupRegistry();
    const projectId = registry.createProject(PLATFORM_ADMIN, PROJECT_ADMIN, 100n, 'meta-ref');
    project = registry.getProject(projectId);
    for (const donor of ['donor-a', 'donor-b', 'donor-c']) {
      fund(registry, donor, 1000n);
    }
  });

  afterEach(() => {
    closeDatabase();
  });

  describe('lifecycle', () => {
    it('starts Active with nothing raised', () => {
      expect(project.getSummary()).toEqual({
        projectId: 1,
        address: project.address,
        admin: PROJECT_ADMIN,
        fundingGoal: 100n,
        fundsRaised: 0n,
        status: ProjectStatus.Active,
        metadataRef: 'meta-ref',
        donorCount: 0,
        evidenceCount: 0,
        createdAt: FIXED_TIME,
      });
    });

    it('flips to Funded on the donation that reaches the goal and pays out 90/10', () => {
      project.donate('donor-a', 30n);
      expect(project.getStatus()).toBe(ProjectStatus.Active);
      project.donate('donor-b', 40n);
      expect(project.getStatus()).toBe(ProjectStatus.Active);
      project.donate('donor-c', 30n);
      expect(project.getStatus()).toBe(ProjectStatus.Funded);
      expect(project.getFundsRaised()).toBe(100n);
      expect(project.getDonors()).toEqual(['donor-a', 'donor-b', 'donor-c']);

      const receipt = project.releaseFunds(PROJECT_ADMIN);

      expect(receipt).toEqual({
        projectId: 1,
        admin: PROJECT_ADMIN,
        treasury: TREASURY,
        feeBps: 1000,
        payouts: [{ assetId: 'native', held: 100n, fee: 10n, net: 90n }],
      });
      const native = ledgerAsset(registry);
      expect(native.balanceOf(PROJECT_ADMIN)).toBe(90n);
      expect(native.balanceOf(TREASURY)).toBe(10n);
      expect(native.balanceOf(project.address)).toBe(0n);
      expect(project.getStatus()).toBe(ProjectStatus.Completed);
    });

    it('records the lifecycle as ledger events', () => {
      project.donate('donor-a', 30n);
      project.donate('donor-b', 40n);
      project.donate('donor-c', 30n);
      project.releaseFunds(PROJECT_ADMIN);

      expect(getLedgerEvents(1).map(event => event.event_type)).toEqual([
        'ProjectCreated',
        'DonationReceived',
        'DonationReceived',
        'DonationReceived',
        'StatusChanged',
        'StatusChanged',
        'FundsReleased',
      ]);
    });

    it('feeds the global ledger once per donation', () => {
      project.donate('donor-a', 30n);
      project.donate('donor-a', 20n);
      project.donate('donor-b', 40n);

      expect(registry.getGlobalDonorTotal('donor-a')).toBe(50n);
      expect(registry.getGlobalStats()).toEqual({ donorCount: 2, donationCount: 3, totalRaised: 90n });
    });

    it('keeps per-donor totals summing to funds raised', () => {
      project.donate('donor-a', 25n);
      project.donate('donor-b', 15n);
      project.donate('donor-a', 35n);

      const totals = project.getDonorTotals();
      expect(totals).toEqual([
        { donor: 'donor-a', amount: 60n },
        { donor: 'donor-b', amount: 15n },
      ]);
      expect(totals.reduce((sum, entry) => sum + entry.amount, 0n)).toBe(project.getFundsRaised());
    });

    it('rejects donations once Funded', () => {
      project.donate('donor-a', 100n);

      expectLedgerError(() => project.donate('donor-b', 10n), 'InvalidStatusTransition');
      expect(project.getFundsRaised()).toBe(100n);
    });

    it('treats funds sent directly as a donation from the sender', () => {
      project.receive('donor-b', 40n);

      expect(project.getDonorTotal('donor-b')).toBe(40n);
      expect(ledgerAsset(registry).balanceOf(project.address)).toBe(40n);
    });
  });

  describe('donation validation', () => {
    it('rejects amounts below the minimum without changing anything', () => {
      expectLedgerError(() => project.donate('donor-a', 9n), 'InvalidAmount');

      expect(project.getFundsRaised()).toBe(0n);
      expect(project.getDonors()).toEqual([]);
      expect(ledgerAsset(registry).balanceOf('donor-a')).toBe(1000n);
      expect(registry.getGlobalStats().donationCount).toBe(0);
    });

    it('accepts exactly the minimum', () => {
      project.donate('donor-a', 10n);

      expect(project.getDonorTotal('donor-a')).toBe(10n);
    });

    it('rejects zero and malformed donors', () => {
      expectLedgerError(() => project.donate('donor-a', 0n), 'InvalidAmount');
      expectLedgerError(() => project.donate('', 50n), 'InvalidIdentity');
    });

    it('fails when the donor cannot cover the transfer', () => {
      expectLedgerError(() => project.donate('donor-broke', 50n), 'TransferFailure');

      expect(project.getDonors()).toEqual([]);
    });

    it('reports zero for donors who never gave', () => {
      expect(project.getDonorTotal('stranger')).toBe(0n);
    });
  });

  describe('releaseFunds', () => {
    it('fails before the goal and moves nothing', () => {
      project.donate('donor-a', 50n);

      expectLedgerError(() => project.releaseFunds(PROJECT_ADMIN), 'GoalNotReached');
      expect(ledgerAsset(registry).balanceOf(PROJECT_ADMIN)).toBe(0n);
      expect(ledgerAsset(registry).balanceOf(project.address)).toBe(50n);
    });

    it('only the project admin may release', () => {
      project.donate('donor-a', 100n);

      expectLedgerError(() => project.releaseFunds('donor-a'), 'Unauthorized');
      expectLedgerError(() => project.releaseFunds(PLATFORM_ADMIN), 'Unauthorized');
    });

    it('fails a second time with AlreadyReleased', () => {
      project.donate('donor-a', 100n);
      project.releaseFunds(PROJECT_ADMIN);

      expectLedgerError(() => project.releaseFunds(PROJECT_ADMIN), 'AlreadyReleased');
      expect(ledgerAsset(registry).balanceOf(PROJECT_ADMIN)).toBe(90n);
    });

    it('refuses a cancelled project', () => {
      project.donate('donor-a', 100n);
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);

      expectLedgerError(() => project.releaseFunds(PROJECT_ADMIN), 'InvalidStatusTransition');
    });

    it('uses the fee in force at release time', () => {
      project.donate('donor-a', 100n);
      registry.setFeeBps(PLATFORM_ADMIN, 0);

      const receipt = project.releaseFunds(PROJECT_ADMIN);

      expect(receipt.payouts).toEqual([{ assetId: 'native', held: 100n, fee: 0n, net: 100n }]);
      expect(ledgerAsset(registry).balanceOf(TREASURY)).toBe(0n);
    });
  });

  describe('token donations', () => {
    beforeEach(() => {
      registry.addAllowedAsset(PLATFORM_ADMIN, 'usdc');
      fund(registry, 'donor-a', 500n, 'usdc');
      fund(registry, 'donor-b', 500n, 'usdc');
    });

    it('pulls approved tokens and counts them toward the goal', () => {
      const usdc = ledgerAsset(registry, 'usdc');
      usdc.approve('donor-a', project.address, 200n);

      project.donateToken('donor-a', 'usdc', 150n);

      expect(project.getStatus()).toBe(ProjectStatus.Funded);
      expect(project.getDonorTotal('donor-a')).toBe(150n);
      expect(usdc.allowance('donor-a', project.address)).toBe(50n);
      expect(usdc.balanceOf(project.address)).toBe(150n);
    });

    it('pays out each held asset separately', () => {
      ledgerAsset(registry, 'usdc').approve('donor-b', project.address, 50n);
      project.donate('donor-a', 60n);
      project.donateToken('donor-b', 'usdc', 50n);

      const receipt = project.releaseFunds(PROJECT_ADMIN);

      expect(receipt.payouts).toEqual([
        { assetId: 'native', held: 60n, fee: 6n, net: 54n },
        { assetId: 'usdc', held: 50n, fee: 5n, net: 45n },
      ]);
      expect(ledgerAsset(registry, 'usdc').balanceOf(PROJECT_ADMIN)).toBe(45n);
      expect(ledgerAsset(registry, 'usdc').balanceOf(TREASURY)).toBe(5n);
    });

    it('rejects assets off the allowlist', () => {
      expectLedgerError(() => project.donateToken('donor-a', 'gold', 50n), 'AssetNotAllowed');
    });

    it('refunds only the native portion and keeps token contributions in the instance', () => {
      const usdc = ledgerAsset(registry, 'usdc');
      const native = ledgerAsset(registry);
      usdc.approve('donor-a', project.address, 40n);
      usdc.approve('donor-b', project.address, 20n);
      project.donateToken('donor-a', 'usdc', 40n);
      project.donate('donor-a', 20n);
      project.donateToken('donor-b', 'usdc', 20n);
      project.donate('donor-b', 10n);
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);

      expect(project.refundDonor(PROJECT_ADMIN, 'donor-b')).toBe(10n);
      expect(project.getSummary().fundsRaised).toBe(60n);
      expect(usdc.balanceOf(project.address)).toBe(60n);

      expect(project.refundAllDonors(PROJECT_ADMIN)).toBe(20n);
      expect(project.getSummary().fundsRaised).toBe(0n);
      expect(usdc.balanceOf(project.address)).toBe(60n);
      expect(usdc.balanceOf('donor-a')).toBe(460n);
      expect(native.balanceOf('donor-a')).toBe(1000n);
      expect(native.balanceOf('donor-b')).toBe(1000n);
      expect(native.balanceOf(project.address)).toBe(0n);
      expect(native.balanceOf('donor-c')).toBe(1000n);
      expect(usdc.balanceOf('donor-c')).toBe(0n);
    });

    it('fails without an approval', () => {
      expectLedgerError(() => project.donateToken('donor-b', 'usdc', 50n), 'TransferFailure');

      expect(project.getDonors()).toEqual([]);
      expect(ledgerAsset(registry, 'usdc').balanceOf('donor-b')).toBe(500n);
    });
  });

  describe('evidence', () => {
    it('appends with sequential indexes', () => {
      expect(project.submitEvidence(PROJECT_ADMIN, 'sha256:first')).toBe(0);
      expect(project.submitEvidence(PROJECT_ADMIN, 'sha256:second')).toBe(1);

      expect(project.getEvidenceCount()).toBe(2);
      expect(project.getEvidence(1)).toEqual({
        index: 1,
        contentHash: 'sha256:second',
        submittedAt: FIXED_TIME,
        submitter: PROJECT_ADMIN,
      });
    });

    it('rejects out-of-range indexes', () => {
      project.submitEvidence(PROJECT_ADMIN, 'sha256:first');

      expectLedgerError(() => project.getEvidence(1), 'InvalidReference');
      expectLedgerError(() => project.getEvidence(-1), 'InvalidReference');
    });

    it('rejects empty hashes and non-admin submitters', () => {
      expectLedgerError(() => project.submitEvidence(PROJECT_ADMIN, ''), 'InvalidReference');
      expectLedgerError(() => project.submitEvidence('donor-a', 'sha256:first'), 'Unauthorized');
      expect(project.getEvidenceCount()).toBe(0);
    });
  });

  describe('updateStatus', () => {
    it('cancels an active project', () => {
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);

      expect(project.getStatus()).toBe(ProjectStatus.Cancelled);
    });

    it('cancels a funded project', () => {
      project.donate('donor-a', 100n);
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);

      expect(project.getStatus()).toBe(ProjectStatus.Cancelled);
    });

    it('rejects transitions outside the status graph', () => {
      expectLedgerError(() => project.updateStatus(PROJECT_ADMIN, ProjectStatus.Funded), 'InvalidStatusTransition');
      expectLedgerError(() => project.updateStatus(PROJECT_ADMIN, ProjectStatus.Completed), 'InvalidStatusTransition');

      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);
      expectLedgerError(() => project.updateStatus(PROJECT_ADMIN, ProjectStatus.Active), 'InvalidStatusTransition');
    });

    it('only the admin may change status', () => {
      expectLedgerError(() => project.updateStatus('donor-a', ProjectStatus.Cancelled), 'Unauthorized');
    });
  });

  describe('refunds', () => {
    beforeEach(() => {
      project.donate('donor-a', 30n);
      project.donate('donor-b', 20n);
    });

    it('require a cancelled project', () => {
      expectLedgerError(() => project.refundDonor(PROJECT_ADMIN, 'donor-a'), 'InvalidStatusTransition');
      expectLedgerError(() => project.refundAllDonors(PROJECT_ADMIN), 'InvalidStatusTransition');
    });

    it('refund one donor and leave the global ledger untouched', () => {
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);

      expect(project.refundDonor(PROJECT_ADMIN, 'donor-a')).toBe(30n);

      expect(ledgerAsset(registry).balanceOf('donor-a')).toBe(1000n);
      expect(project.getDonorTotal('donor-a')).toBe(0n);
      expect(project.getFundsRaised()).toBe(20n);
      expect(registry.getGlobalDonorTotal('donor-a')).toBe(30n);
      expect(registry.getGlobalStats().totalRaised).toBe(50n);
      expectLedgerError(() => project.refundDonor(PROJECT_ADMIN, 'donor-a'), 'NoRecordedDonation');
    });

    it('refund everyone and zero every total', () => {
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);
      project.refundDonor(PROJECT_ADMIN, 'donor-a');

      expect(project.refundAllDonors(PROJECT_ADMIN)).toBe(20n);

      expect(project.getDonors()).toEqual([]);
      expect(project.getFundsRaised()).toBe(0n);
      expect(project.getDonorTotal('donor-b')).toBe(0n);
      expect(ledgerAsset(registry).balanceOf('donor-b')).toBe(1000n);
      expect(ledgerAsset(registry).balanceOf(project.address)).toBe(0n);
    });

    it('reject donors with nothing recorded and non-admin callers', () => {
      project.updateStatus(PROJECT_ADMIN, ProjectStatus.Cancelled);

      expectLedgerError(() => project.refundDonor(PROJECT_ADMIN, 'donor-c'), 'NoRecordedDonation');
      expectLedgerError(() => project.refundAllDonors('donor-a'), 'Unauthorized');
    });
  });

  describe('initialize', () => {
    it('cannot run twice', () => {
      expectLedgerError(
        () => project.initialize(registry.identity, 9, PROJECT_ADMIN, 10n, 'again'),
        'AlreadyInitialized'
      );
      expect(project.getProjectId()).toBe(1);
    });

    it('accepts only the registry as caller', () => {
      const orphan = new ProjectInstance('project:orphan', registry);

      expectLedgerError(() => orphan.initialize('mallory', 7, 'orphan-admin', 50n, 'meta'), 'Unauthorized');
      expectLedgerError(() => orphan.initialize(registry.identity, 0, 'orphan-admin', 50n, 'meta'), 'InvalidAmount');
      expectLedgerError(() => orphan.initialize(registry.identity, 7, 'orphan-admin', 0n, 'meta'), 'InvalidAmount');
      expect(orphan.isInitialized()).toBe(false);

      orphan.initialize(registry.identity, 7, 'orphan-admin', 50n, 'meta');
      expect(orphan.getProjectId()).toBe(7);
      expect(orphan.getAdmin()).toBe('orphan-admin');
      expect(orphan.getFundingGoal()).toBe(50n);
    });

    it('reads fail before initialization', () => {
      const orphan = new ProjectInstance('project:orphan', registry);

      expectLedgerError(() => orphan.getSummary(), 'NotInitialized');
      expectLedgerError(() => orphan.getDonors(), 'NotInitialized');
      expectLedgerError(() => orphan.donate('donor-a', 50n), 'NotInitialized');
    });
  });
});

describe('splitFee', () => {
  it('floors the fee and gives the remainder to the admin', () => {
    expect(splitFee(100n, 1000)).toEqual({ fee: 10n, net: 90n });
    expect(splitFee(99n, 250)).toEqual({ fee: 2n, net: 97n });
    expect(splitFee(1n, 5000)).toEqual({ fee: 0n, net: 1n });
  });
});

describe('checkStatusUpdate', () => {
  it('allows the admin transitions', () => {
    expect(() => checkStatusUpdate(ProjectStatus.Active, ProjectStatus.Cancelled, false)).not.toThrow();
    expect(() => checkStatusUpdate(ProjectStatus.Funded, ProjectStatus.Cancelled, true)).not.toThrow();
    expect(() => checkStatusUpdate(ProjectStatus.Active, ProjectStatus.Funded, true)).not.toThrow();
  });

  it('rejects everything else', () => {
    expectLedgerError(() => checkStatusUpdate(ProjectStatus.Active, ProjectStatus.Funded, false), 'InvalidStatusTransition');
    expectLedgerError(() => checkStatusUpdate(ProjectStatus.Funded, ProjectStatus.Active, true), 'InvalidStatusTransition');
    expectLedgerError(() => checkStatusUpdate(ProjectStatus.Completed, ProjectStatus.Cancelled, true), 'InvalidStatusTransition');
    expectLedgerError(() => checkStatusUpdate(ProjectStatus.Funded, ProjectStatus.Funded, true), 'InvalidStatusTransition');
  });
});
