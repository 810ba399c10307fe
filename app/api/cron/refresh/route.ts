export const dynamic = 'force-dynamic';

import { NextRequest } from 'next/server';
import { errorResponse, ok, parseProps } from '@/lib/apiResponses';
import { InvalidInputError } from '@/lib/errors';
import { authorizeCronRequest } from '@/lib/cronAuth';
import { createLogger } from '@/lib/logger';
import { getServices } from '@/lib/services';
import type { PropRequest } from '@/lib/edge-engine/types';

export const runtime = 'nodejs';
export const maxDuration = 300; // 5 minutes

const log = createLogger('Cron Refresh');

/**
 * Scheduled refresh
 * Re-fetches stats for the props in the body (or every chase-list entry when the body is empty),
 * records their lines, then purges cache entries past the retention window.
 */
export async function POST(request: NextRequest) {
  const auth = authorizeCronRequest(request);
  if (!auth.authorized) {
    return auth.response;
  }

  try {
    const { edgeService, tracker, cache } = getServices();
    const text = await request.text();

    let props: PropRequest[];
    if (text.trim()) {
      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch {
        return errorResponse(new InvalidInputError('Request body must be valid JSON'));
      }
      props = parseProps(body);
    } else {
      const chase = await tracker.listChase();
      props = chase.map(entry => ({ playerId: entry.playerId, statType: entry.statType, line: entry.lineValue }));
    }

    const startTime = Date.now();
    const summary = await edgeService.refresh(props);
    const purged = await cache.purge();
    log.info(`Refreshed ${props.length} props in ${Date.now() - startTime}ms, purged ${purged} cache entries`);

    return ok({ ...summary, purged });
  } catch (error) {
    return errorResponse(error);
  }
}

// Schedulers that only issue GET
export async function GET(request: NextRequest) {
  return POST(request);
}
