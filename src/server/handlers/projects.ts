/**
 * Project routes: creation, donations, release, evidence, status and refunds.
 */
import { getLedgerEvents } from '../database.js';
import type { Registry } from '../ledger/registry.js';
import { LedgerError } from '../ledger/errors.js';
import { isProjectStatus } from '../ledger/project.js';
import {
  parseAmount,
  parseIndex,
  parseProjectId,
  requireCaller,
  requireString,
  type LedgerRoute,
} from './http.js';

export function projectRoutes(registry: Registry): LedgerRoute[] {
  const project = (id: string | undefined) => registry.getProject(parseProjectId(id));

  return [
    {
      method: 'post',
      path: '/api/projects',
      status: 201,
      mutates: true,
      handle: ctx => {
        const creator = requireCaller(ctx);
        const projectId = registry.createProject(
          creator,
          requireString(ctx.body.get('admin'), 'admin'),
          parseAmount(ctx.body.get('fundingGoal'), 'fundingGoal'),
          requireString(ctx.body.get('metadataRef') ?? '', 'metadataRef')
        );
        return registry.getProject(projectId).getSummary();
      },
    },
    {
      method: 'get',
      path: '/api/projects',
      handle: () => ({
        projects: registry.listProjectIds().map(id => registry.getProject(id).getSummary()),
      }),
    },
    {
      method: 'get',
      path: '/api/projects/:id',
      handle: ({ params }) => project(params.id).getSummary(),
    },
    {
      method: 'get',
      path: '/api/projects/:id/donors',
      handle: ({ params }) => ({ donors: project(params.id).getDonorTotals() }),
    },
    {
      method: 'get',
      path: '/api/projects/:id/donors/:donor',
      handle: ({ params }) => ({
        donor: params.donor,
        amount: project(params.id).getDonorTotal(params.donor),
      }),
    },
    {
      method: 'post',
      path: '/api/projects/:id/donations',
      status: 201,
      mutates: true,
      handle: ctx => {
        const donor = requireCaller(ctx);
        const instance = project(ctx.params.id);
        const amount = parseAmount(ctx.body.get('amount'), 'amount');
        const assetId = ctx.body.get('assetId');
        if (assetId === undefined) {
          instance.donate(donor, amount);
        } else {
          instance.donateToken(donor, requireString(assetId, 'assetId'), amount);
        }
        return instance.getSummary();
      },
    },
    {
      method: 'post',
      path: '/api/projects/:id/release',
      mutates: true,
      handle: ctx => project(ctx.params.id).releaseFunds(requireCaller(ctx)),
    },
    {
      method: 'post',
      path: '/api/projects/:id/status',
      mutates: true,
      handle: ctx => {
        const caller = requireCaller(ctx);
        const status = ctx.body.get('status');
        if (!isProjectStatus(status)) {
          throw new LedgerError('InvalidStatusTransition', `Unknown status: ${String(status)}`);
        }
        const instance = project(ctx.params.id);
        instance.updateStatus(caller, status);
        return instance.getSummary();
      },
    },
    {
      method: 'post',
      path: '/api/projects/:id/evidence',
      status: 201,
      mutates: true,
      handle: ctx => {
        const caller = requireCaller(ctx);
        const index = project(ctx.params.id).submitEvidence(caller, requireString(ctx.body.get('contentHash'), 'contentHash'));
        return { index };
      },
    },
    {
      method: 'get',
      path: '/api/projects/:id/events',
      handle: ({ params }) => {
        const projectId = project(params.id).getProjectId();
        return {
          events: getLedgerEvents(projectId).map(event => {
            const payload: unknown = JSON.parse(event.payload_json);
            return { id: event.id, type: event.event_type, payload, createdAt: event.created_at };
          }),
        };
      },
    },
    {
      method: 'get',
      path: '/api/projects/:id/evidence/:index',
      handle: ({ params }) => project(params.id).getEvidence(parseIndex(params.index, 'index')),
    },
    {
      method: 'post',
      path: '/api/projects/:id/refunds',
      mutates: true,
      handle: ctx => {
        const caller = requireCaller(ctx);
        const instance = project(ctx.params.id);
        const donor = ctx.body.get('donor');
        if (donor === undefined) {
          return { refunded: instance.refundAllDonors(caller) };
        }
        const target = requireString(donor, 'donor');
        return { donor: target, refunded: instance.refundDonor(caller, target) };
      },
    },
  ];
}
