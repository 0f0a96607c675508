import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Accepts `Authorization: Bearer <token>` or, for clients that cannot set headers, `?token=`. */
export function isAuthorized(expected: string | undefined, header: string | undefined, queryToken: unknown): boolean {
  if (!expected) return true;
  return header === `Bearer ${expected}` || queryToken === expected;
}

/** Bearer-token gate. With no token configured, access is open. */
export function createRequireAuth(token: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (isAuthorized(token, req.headers.authorization, req.query.token)) return next();
    res.status(401).json({ ok: false, code: 'UNAUTHORIZED', message: 'Unauthorized' });
  };
}

export function checkWsToken(expected: string | undefined, token: string | undefined): boolean {
  if (!expected) return true;
  return token === expected;
}
