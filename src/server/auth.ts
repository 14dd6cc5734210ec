import jwt from 'jsonwebtoken';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

const ISSUER = 'pim-autoactivate';
const DEFAULT_TTL_SECONDS = 24 * 60 * 60;

/** `read` sees state and audit data; `run` may also trigger runs. */
export type TokenScope = 'read' | 'run';

const GRANTS: Record<TokenScope, readonly TokenScope[]> = {
  read: ['read'],
  run: ['read', 'run'],
};

export function isTokenScope(value: unknown): value is TokenScope {
  return value === 'read' || value === 'run';
}

/** Returns the token's scope, or null when it is missing, expired, forged or foreign. */
export function tokenScope(token: string, secret: string): TokenScope | null {
  try {
    const payload = jwt.verify(token, secret, { issuer: ISSUER });
    if (typeof payload === 'string') return null;
    return isTokenScope(payload.scope) ? payload.scope : null;
  } catch {
    return null;
  }
}

export function requireToken(secret: string, needed: TokenScope): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing authorization header' });
      return;
    }

    const scope = tokenScope(header.slice(7), secret);
    if (!scope) {
      res.status(401).json({ error: 'Invalid token' });
      return;
    }
    if (!GRANTS[scope].includes(needed)) {
      res.status(403).json({ error: `Token lacks ${needed} scope` });
      return;
    }
    next();
  };
}

export function generateInternalToken(
  secret: string,
  scope: TokenScope = 'run',
  expiresInSeconds = DEFAULT_TTL_SECONDS,
): string {
  return jwt.sign({ scope }, secret, { issuer: ISSUER, expiresIn: expiresInSeconds });
}
