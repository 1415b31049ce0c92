// Donation badges - tier classification and minting for the badge trigger hook
import { getBadgesByDonor, insertBadge, type BadgeRecord } from '../database.js';
import { systemClock, type BadgeIssuer, type Clock, type Identity } from '../types/ledger.js';

export enum BadgeTier {
  NONE = 0,
  BRONZE = 1,
  SILVER = 2,
  GOLD = 3,
}

const TIER_THRESHOLDS: { tier: BadgeTier; minimum: bigint }[] = [
  { tier: BadgeTier.GOLD, minimum: 100_000n },
  { tier: BadgeTier.SILVER, minimum: 10_000n },
  { tier: BadgeTier.BRONZE, minimum: 1_000n },
];

export function getEligibleTier(amount: bigint): BadgeTier {
  return TIER_THRESHOLDS.find(({ minimum }) => amount >= minimum)?.tier ?? BadgeTier.NONE;
}

export function getTierName(tier: BadgeTier): string {
  switch (tier) {
    case BadgeTier.BRONZE:
      return 'Bronze Donor';
    case BadgeTier.SILVER:
      return 'Silver Donor';
    case BadgeTier.GOLD:
      return 'Gold Donor';
    default:
      return 'No Badge';
  }
}

function tierColumn(tier: BadgeTier): BadgeRecord['tier'] | null {
  switch (tier) {
    case BadgeTier.BRONZE:
      return 'bronze';
    case BadgeTier.SILVER:
      return 'silver';
    case BadgeTier.GOLD:
      return 'gold';
    default:
      return null;
  }
}

/**
 * Mints one badge per call into the ledger database, at the highest tier the
 * amount qualifies for. Amounts below the bronze threshold are rejected.
 */
export class TieredBadgeIssuer implements BadgeIssuer {
  constructor(private readonly clock: Clock = systemClock) {}

  mint(donor: Identity, projectId: number, amount: bigint, metadataRef: string): number {
    const tier = getEligibleTier(amount);
    const column = tierColumn(tier);
    if (column === null) {
      throw new Error(`[Badges] Donation of ${amount} is below the ${getTierName(BadgeTier.BRONZE)} threshold`);
    }

    const badgeId = insertBadge({
      donor,
      project_id: projectId,
      amount: amount.toString(),
      tier: column,
      metadata_ref: metadataRef,
      minted_at: this.clock.now().toISOString(),
    });
    console.log(`[Badges] Minted #${badgeId} (${getTierName(tier)}) for ${donor} on project ${projectId}`);
    return badgeId;
  }

  getBadges(donor: Identity): BadgeRecord[] {
    return getBadgesByDonor(donor);
  }
}
