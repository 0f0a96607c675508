import type { Request, Response, NextFunction, RequestHandler } from 'express';

const WINDOW_MS = 60_000;

/** Fixed-window counter per key. Returns false once a key exceeds `maxPerWindow`. */
export function createHitCounter(maxPerWindow: number, now: () => number = Date.now): (key: string) => boolean {
  const hits = new Map<string, { count: number; resetAt: number }>();

  return (key: string) => {
    const t = now();
    let entry = hits.get(key);
    if (!entry || t > entry.resetAt) {
      entry = { count: 0, resetAt: t + WINDOW_MS };
      hits.set(key, entry);
    }
    entry.count++;
    return entry.count <= maxPerWindow;
  };
}

/** Fixed-window per-IP limiter. */
export function createRateLimit(maxPerWindow: number, now: () => number = Date.now): RequestHandler {
  const hit = createHitCounter(maxPerWindow, now);

  return (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    if (!hit(ip)) {
      res.status(429).json({ ok: false, code: 'RATE_LIMITED', message: 'Too many requests. Try again later.' });
      return;
    }
    next();
  };
}
