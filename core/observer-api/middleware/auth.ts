import { Request, Response, NextFunction, RequestHandler } from 'express';

export interface AuthGuardOptions {
  /** Requests per IP and path per window */
  limit?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * Bearer-token guard with a per-IP sliding-window rate limit. An empty
 * token rejects every request.
 */
export function createAuthGuard(token: string, options: AuthGuardOptions = {}): RequestHandler {
  const limit = options.limit ?? 30;
  const windowMs = options.windowMs ?? 60000;
  const now = options.now ?? Date.now;
  const rateLimitMap = new Map<string, Map<string, number[]>>();

  function isRateLimited(ip: string, path: string): boolean {
    const t = now();
    let ipMap = rateLimitMap.get(ip);
    if (!ipMap) {
      ipMap = new Map();
      rateLimitMap.set(ip, ipMap);
    }
    let timestamps = ipMap.get(path);
    if (!timestamps) {
      timestamps = [];
      ipMap.set(path, timestamps);
    }
    while (timestamps.length > 0 && timestamps[0] < t - windowMs) timestamps.shift();
    if (timestamps.length >= limit) return true;
    timestamps.push(t);
    return false;
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const path = req.path;
    const ip = req.ip || 'unknown';

    if (isRateLimited(ip, path)) {
      console.error(`[AUTH] code=TOO_MANY_REQUESTS ip=${ip} path=${path}`);
      res.status(429).json({ error: 'TOO_MANY_REQUESTS', message: `Limit ${limit}/min` });
      return;
    }

    const authHeader = req.headers.authorization;
    let provided = '';
    if (authHeader && authHeader.startsWith('Bearer ')) {
      provided = authHeader.substring(7);
    }

    if (!token || provided !== token) {
      console.error(`[AUTH] code=UNAUTHORIZED ip=${ip} path=${path}`);
      res.status(401).json({ error: 'UNAUTHORIZED', message: 'Bearer token required' });
      return;
    }

    next();
  };
}
