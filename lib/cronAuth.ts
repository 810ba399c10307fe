import { NextResponse } from 'next/server';
import { getOptionalEnv } from './env';

type CronAuthResult =
  | { authorized: true }
  | { authorized: false; response: NextResponse };

/**
 * Validate that a request is authorized to trigger cron endpoints.
 * Requires CRON_SECRET and checks, in order:
 * - ?secret=<secret> (manual runs)
 * - X-Cron-Secret: <secret>
 * - Authorization: Bearer <secret>
 * - X-Vercel-Cron: 1 (scheduler calls, authenticated by the platform)
 */
export function authorizeCronRequest(request: Request, cronSecret = getOptionalEnv('CRON_SECRET')): CronAuthResult {
  if (request.headers.get('x-vercel-cron') === '1') {
    return { authorized: true };
  }

  if (!cronSecret) {
    return {
      authorized: false,
      response: NextResponse.json(
        { error: 'CRON_SECRET is not configured', code: 'CONFIG' },
        { status: 500 }
      ),
    };
  }

  const headerSecret = request.headers.get('x-cron-secret');
  const authHeader = request.headers.get('authorization');
  const bearerSecret = authHeader?.startsWith('Bearer ')
    ? authHeader.slice(7).trim()
    : null;
  const querySecret = new URL(request.url).searchParams.get('secret');

  const providedSecret = querySecret || headerSecret || bearerSecret;

  if (!providedSecret || providedSecret !== cronSecret) {
    return {
      authorized: false,
      response: NextResponse.json(
        { error: 'Unauthorized cron access', code: 'UNAUTHORIZED' },
        { status: 401 }
      ),
    };
  }

  return { authorized: true };
}
