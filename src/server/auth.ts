import type { ApiRequest, ApiResponse, NextHandler } from './types';

/**
 * Shared-token authentication middleware
 *
 * Accepts "Bearer <token>" or the bare token in the Authorization header.
 *
 * @param apiToken - Configured token; empty rejects every request with 500
 */
export function createTokenAuth(apiToken: string) {
  return function tokenAuth(req: ApiRequest, res: ApiResponse, next: NextHandler): void {
    if (!apiToken) {
      res.status(500).json({ error: 'Authentication not configured' });
      return;
    }

    const authHeader = req.headers.authorization;

    if (!authHeader) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    const token = authHeader.startsWith('Bearer ')
      ? authHeader.substring(7)
      : authHeader;

    if (token !== apiToken) {
      res.status(401).json({ error: 'Invalid credentials' });
      return;
    }

    next();
  };
}
