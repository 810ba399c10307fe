export const dynamic = 'force-dynamic';

/**
 * Chase list - props a user is watching for a better number
 * GET                                         - all entries, oldest first
 * POST   { playerId, statType, lineValue, reason? } - add or overwrite
 * DELETE ?player_id=&stat_type=
 */

import { NextRequest } from 'next/server';
import {
  errorResponse,
  ok,
  optionalString,
  queryParams,
  readJsonBody,
  requireNumber,
  requireString,
} from '@/lib/apiResponses';
import { getServices } from '@/lib/services';
import { normalizeStatType } from '@/lib/statCategories';

export async function GET() {
  try {
    const entries = await getServices().tracker.listChase();
    return ok({ entries });
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const entry = await getServices().tracker.addToChaseList({
      playerId: requireString(body, 'playerId'),
      statType: normalizeStatType(requireString(body, 'statType')),
      lineValue: requireNumber(body, 'lineValue'),
      reason: optionalString(body, 'reason'),
    });
    return ok(entry, 201);
  } catch (error) {
    return errorResponse(error);
  }
}

export async function DELETE(request: NextRequest) {
  try {
    const params = queryParams(request);
    const removed = await getServices().tracker.removeFromChaseList(
      requireString(params, 'player_id'),
      normalizeStatType(requireString(params, 'stat_type'))
    );
    return ok({ removed });
  } catch (error) {
    return errorResponse(error);
  }
}
