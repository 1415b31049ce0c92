import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { RequestMetadata } from '../types/logging.js';

export const IDENTITY_HEADER = 'x-ledger-identity';

// Extend Express Request type to include metadata
declare global {
  namespace Express {
    interface Request {
      metadata?: RequestMetadata;
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function loggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  // Generate or retrieve session ID from cookie/header
  const cookieSession: unknown = req.cookies?.session_id;
  let sessionId = typeof cookieSession === 'string' ? cookieSession : firstHeader(req.headers['x-session-id']);

  if (!sessionId) {
    sessionId = uuidv4();
    // Set session cookie (expires in 24 hours)
    res.cookie('session_id', sessionId, {
      maxAge: 24 * 60 * 60 * 1000,
      httpOnly: true,
      sameSite: 'strict'
    });
  }

  // Extract IP address (handle proxies)
  const ip = (
    firstHeader(req.headers['x-forwarded-for']) ||
    firstHeader(req.headers['x-real-ip']) ||
    req.socket.remoteAddress ||
    'unknown'
  ).split(',')[0].trim();

  const caller = firstHeader(req.headers[IDENTITY_HEADER])?.trim() || null;

  req.metadata = {
    session_id: sessionId,
    ip_address: ip,
    user_agent: req.headers['user-agent'] || 'unknown',
    caller,
  };

  if (req.method !== 'GET') {
    console.log(`[Request] ${req.method} ${req.path} caller=${caller ?? '-'} ip=${ip}`);
  }

  next();
}
