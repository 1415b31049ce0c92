/**
 * Platform routes: leaderboard, stats, administration, badges and the
 * ledger-backed asset accounts.
 */
import { LEDGER_CONFIG } from '../config.js';
import { LedgerError, assertIdentity, assertPositiveAmount } from '../ledger/errors.js';
import { isRole, type Registry } from '../ledger/registry.js';
import { NATIVE_ASSET, type Role } from '../types/ledger.js';
import {
  parseAmount,
  parseIndex,
  parseProjectId,
  requireBoolean,
  requireCaller,
  requireString,
  type LedgerRoute,
} from './http.js';

function parseRole(value: string | undefined): Role {
  if (!isRole(value)) {
    throw new LedgerError('InvalidReference', `Unknown role: ${value ?? ''}`);
  }
  return value;
}

export interface PlatformRouteOptions {
  faucetEnabled?: boolean;
}

export function platformRoutes(registry: Registry, options: PlatformRouteOptions = {}): LedgerRoute[] {
  const faucetEnabled = options.faucetEnabled ?? LEDGER_CONFIG.faucetEnabled;

  const routes: LedgerRoute[] = [
    {
      method: 'get',
      path: '/api/leaderboard',
      handle: ({ query }) =>
        registry.getLeaderboard(parseIndex(query.get('start'), 'start', 0), parseIndex(query.get('end'), 'end', 10)),
    },
    {
      method: 'get',
      path: '/api/stats',
      handle: () => ({
        ...registry.getGlobalStats(),
        projectCount: registry.listProjectIds().length,
        feeBps: registry.getFeeBps(),
        treasury: registry.getTreasury(),
        paused: registry.isPaused(),
        allowAllAssets: registry.isAllowAllAssets(),
        allowedAssets: registry.listAllowedAssets(),
      }),
    },

    // ------------------------------------------------------------------------
    // Administration
    // ------------------------------------------------------------------------
    {
      method: 'post',
      path: '/api/admin/fee',
      mutates: true,
      handle: ctx => {
        registry.setFeeBps(requireCaller(ctx), parseIndex(ctx.body.get('feeBps'), 'feeBps'));
        return { feeBps: registry.getFeeBps() };
      },
    },
    {
      method: 'post',
      path: '/api/admin/treasury',
      mutates: true,
      handle: ctx => {
        registry.setTreasury(requireCaller(ctx), requireString(ctx.body.get('treasury'), 'treasury'));
        return { treasury: registry.getTreasury() };
      },
    },
    {
      method: 'post',
      path: '/api/admin/pause',
      mutates: true,
      handle: ctx => {
        registry.pause(requireCaller(ctx));
        return { paused: true };
      },
    },
    {
      method: 'post',
      path: '/api/admin/unpause',
      mutates: true,
      handle: ctx => {
        registry.unpause(requireCaller(ctx));
        return { paused: false };
      },
    },
    {
      method: 'post',
      path: '/api/admin/assets/:assetId',
      mutates: true,
      handle: ctx => {
        registry.addAllowedAsset(requireCaller(ctx), ctx.params.assetId);
        return { assetId: ctx.params.assetId, allowed: true };
      },
    },
    {
      method: 'delete',
      path: '/api/admin/assets/:assetId',
      mutates: true,
      handle: ctx => {
        registry.removeAllowedAsset(requireCaller(ctx), ctx.params.assetId);
        return { assetId: ctx.params.assetId, allowed: false };
      },
    },
    {
      method: 'post',
      path: '/api/admin/assets-allow-all',
      mutates: true,
      handle: ctx => {
        const enabled = requireBoolean(ctx.body.get('enabled'), 'enabled');
        registry.setAllowAllAssets(requireCaller(ctx), enabled);
        return { allowAllAssets: enabled };
      },
    },
    {
      method: 'post',
      path: '/api/admin/roles/:role/:identity',
      mutates: true,
      handle: ctx => {
        const role = parseRole(ctx.params.role);
        registry.grantRole(requireCaller(ctx), ctx.params.identity, role);
        return { identity: ctx.params.identity, role, granted: true };
      },
    },
    {
      method: 'delete',
      path: '/api/admin/roles/:role/:identity',
      mutates: true,
      handle: ctx => {
        const role = parseRole(ctx.params.role);
        registry.revokeRole(requireCaller(ctx), ctx.params.identity, role);
        return { identity: ctx.params.identity, role, granted: false };
      },
    },

    // ------------------------------------------------------------------------
    // Badges
    // ------------------------------------------------------------------------
    {
      method: 'post',
      path: '/api/badges',
      status: 201,
      mutates: true,
      handle: ctx => {
        const projectId = ctx.body.get('projectId');
        const badgeId = registry.triggerBadgeMint(
          requireCaller(ctx),
          requireString(ctx.body.get('donor'), 'donor'),
          parseProjectId(typeof projectId === 'number' ? String(projectId) : requireString(projectId, 'projectId')),
          requireString(ctx.body.get('metadataRef') ?? '', 'metadataRef')
        );
        return { badgeId };
      },
    },

    // ------------------------------------------------------------------------
    // Accounts
    // ------------------------------------------------------------------------
    {
      method: 'get',
      path: '/api/accounts/:identity/balances/:assetId',
      handle: ({ params }) => ({
        identity: params.identity,
        assetId: params.assetId,
        balance: registry.getAssetProvider(params.assetId).balanceOf(params.identity),
      }),
    },
    {
      method: 'post',
      path: '/api/accounts/:identity/approvals',
      mutates: true,
      handle: ctx => {
        const owner = requireCaller(ctx);
        if (owner !== ctx.params.identity) {
          throw new LedgerError('Unauthorized', `${owner} cannot approve spending for ${ctx.params.identity}`);
        }
        const assetId = requireString(ctx.body.get('assetId'), 'assetId');
        const spender = requireString(ctx.body.get('spender'), 'spender');
        assertIdentity(spender, 'spender');
        const asset = registry.getLedgerAsset(assetId);
        if (!asset) {
          throw new LedgerError('AssetNotAllowed', `Asset ${assetId} is not ledger-backed`, { assetId });
        }
        asset.approve(owner, spender, parseAmount(ctx.body.get('amount'), 'amount'));
        return { owner, spender, assetId, allowance: asset.allowance(owner, spender) };
      },
    },
  ];

  if (faucetEnabled) {
    routes.push({
      method: 'post',
      path: '/api/accounts/:identity/faucet',
      mutates: true,
      handle: ({ params, body }) => {
        const identity = params.identity;
        assertIdentity(identity, 'identity');
        const requested = body.get('assetId');
        const assetId = requested === undefined ? NATIVE_ASSET : requireString(requested, 'assetId');
        const asset = registry.getLedgerAsset(assetId);
        if (!asset) {
          throw new LedgerError('AssetNotAllowed', `Asset ${assetId} is not ledger-backed`, { assetId });
        }
        const amount = parseAmount(body.get('amount'), 'amount');
        assertPositiveAmount(amount, 'amount');
        asset.mint(identity, amount);
        return { identity, assetId, balance: asset.balanceOf(identity) };
      },
    });
  }

  return routes;
}
