import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';

let validKeys: Set<string> | null = null;

function getValidKeys(): Set<string> {
  if (!validKeys) {
    const raw = env.API_KEYS || '';
    validKeys = new Set(
      raw
        .split(',')
        .map((k) => k.trim())
        .filter((k) => k.length > 0)
    );
  }
  return validKeys;
}

export interface AuthRejection {
  status: 401 | 403;
  error: string;
}

/**
 * Requires a known `x-api-key` on every route. `/health` is the one exception:
 * load balancers and uptime monitors call it without credentials, and it
 * exposes no calendar or session data.
 */
export function checkApiKey(path: string, apiKey: string | undefined): AuthRejection | null {
  if (path === '/health') return null;
  if (!apiKey) return { status: 401, error: 'Missing API key' };

  const keys = getValidKeys();
  if (keys.size === 0 || !keys.has(apiKey)) {
    return { status: 403, error: 'Invalid API key' };
  }
  return null;
}

export function apiKeyAuth(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-api-key'];
  const rejection = checkApiKey(req.path, Array.isArray(header) ? header[0] : header);

  if (rejection) {
    return res.status(rejection.status).json({ success: false, error: rejection.error });
  }

  next();
}
