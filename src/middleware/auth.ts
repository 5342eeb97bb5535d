import { Request, Response, NextFunction } from 'express';

/** Requires a known `x-api-key` header; health checks stay open. */
export function createApiKeyAuth(rawKeys: string | undefined) {
  const validKeys = new Set(
    (rawKeys || '')
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );

  return function apiKeyAuth(req: Request, res: Response, next: NextFunction) {
    if (req.path === '/health' || req.path === '/api/admin/health') {
      return next();
    }

    const apiKey = req.headers['x-api-key'];

    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (validKeys.size === 0 || !validKeys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
