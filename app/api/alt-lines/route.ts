export const dynamic = 'force-dynamic';

/**
 * Alternate lines
 * GET  ?player_id=&stat_type=
 * POST { playerId, statType, mainLine, altLine, source? }
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

export async function GET(request: NextRequest) {
  try {
    const params = queryParams(request);
    const entries = await getServices().tracker.listAltLines(
      requireString(params, 'player_id'),
      normalizeStatType(requireString(params, 'stat_type'))
    );
    return ok({ entries });
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const entry = await getServices().tracker.addAltLine({
      playerId: requireString(body, 'playerId'),
      statType: normalizeStatType(requireString(body, 'statType')),
      mainLine: requireNumber(body, 'mainLine'),
      altLine: requireNumber(body, 'altLine'),
      source: optionalString(body, 'source'),
    });
    return ok(entry, 201);
  } catch (error) {
    return errorResponse(error);
  }
}
