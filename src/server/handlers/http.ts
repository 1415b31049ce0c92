/**
 * HTTP plumbing shared by the ledger routes: request parsing, error mapping and
 * the route table type mounted by app.ts.
 */
import type { Request, RequestHandler, Response } from 'express';
import { LedgerError, isLedgerError, type LedgerErrorCode } from '../ledger/errors.js';
import type { Identity } from '../types/ledger.js';

export type RouteMethod = 'get' | 'post' | 'delete';

export interface RouteContext {
  params: Record<string, string>;
  query: Map<string, unknown>;
  body: Map<string, unknown>;
  caller: Identity | null;
}

export interface LedgerRoute {
  method: RouteMethod;
  path: string;
  /** Status sent on success */
  status?: number;
  /** Mutating routes go through the rate limiter */
  mutates?: boolean;
  handle: (ctx: RouteContext) => unknown;
}

// ============================================================================
// ERROR MAPPING
// ============================================================================

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  InvalidAmount: 400,
  InvalidIdentity: 400,
  InvalidReference: 400,
  AssetNotAllowed: 400,
  FeeExceedsCeiling: 400,
  Unauthorized: 403,
  UnknownProjectId: 404,
  NotInitialized: 404,
  AlreadyInitialized: 409,
  InvalidStatusTransition: 409,
  GoalNotReached: 409,
  AlreadyReleased: 409,
  NoRecordedDonation: 409,
  RegistryPaused: 409,
  ReentrantCall: 409,
  TransferFailure: 502,
  TemplateMisconfigured: 500,
};

export function statusForError(error: unknown): number {
  return isLedgerError(error) ? STATUS_BY_CODE[error.code] : 500;
}

export interface ErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function errorBody(error: unknown): ErrorBody {
  if (isLedgerError(error)) {
    return error.details
      ? { error: error.code, message: error.message, details: error.details }
      : { error: error.code, message: error.message };
  }
  return { error: 'InternalError', message: 'Internal server error' };
}

export function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  if (status === 500) {
    console.error('[Server] Request failed:', error);
  }
  res.status(status).json(errorBody(error));
}

/** `json replacer` for Express: amounts are bigint and travel as decimal strings */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// ============================================================================
// PARSING
// ============================================================================

const DIGITS = /^\d+$/;

export function toFieldMap(value: unknown): Map<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return new Map();
  }
  return new Map(Object.entries(value));
}

/** Amounts arrive as decimal strings; small amounts may also be plain JSON integers */
export function parseAmount(value: unknown, field: string): bigint {
  if (typeof value === 'string' && DIGITS.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  throw new LedgerError('InvalidAmount', `${field} must be a non-negative integer amount`, { field });
}

export function parseIndex(value: unknown, field: string, fallback?: number): number {
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  const text = typeof value === 'number' ? String(value) : value;
  if (typeof text === 'string' && DIGITS.test(text) && Number.isSafeInteger(Number(text))) {
    return Number(text);
  }
  throw new LedgerError('InvalidAmount', `${field} must be a non-negative integer`, { field });
}

export function parseProjectId(value: string | undefined): number {
  if (value === undefined || !DIGITS.test(value) || !Number.isSafeInteger(Number(value))) {
    throw new LedgerError('InvalidReference', `Invalid project id: ${value ?? ''}`);
  }
  return Number(value);
}

export function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new LedgerError('InvalidReference', `${field} must be a string`, { field });
  }
  return value;
}

export function requireBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new LedgerError('InvalidReference', `${field} must be a boolean`, { field });
  }
  return value;
}

export function requireCaller(ctx: RouteContext): Identity {
  if (!ctx.caller) {
    throw new LedgerError('Unauthorized', 'Missing x-ledger-identity header');
  }
  return ctx.caller;
}

// ============================================================================
// EXPRESS ADAPTER
// ============================================================================

export function contextFromRequest(req: Request): RouteContext {
  return {
    params: req.params,
    query: toFieldMap(req.query),
    body: toFieldMap(req.body),
    caller: req.metadata?.caller ?? null,
  };
}

export function ledgerRoute(route: LedgerRoute): RequestHandler {
  return (req, res) => {
    try {
      const result = route.handle(contextFromRequest(req));
      res.status(route.status ?? 200).json(result ?? { ok: true });
    } catch (error) {
      sendError(res, error);
    }
  };
}
