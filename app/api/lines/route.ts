export const dynamic = 'force-dynamic';

/**
 * Line history
 * GET   ?since=<epoch ms>[&player_id=&stat_type=]  - change events since a time
 * GET   ?player_id=&stat_type=                     - current line and movement for a pair
 * POST  { playerId, statType, value, timestamp? }  - record a posted line
 * PATCH { playerId, statType, value }              - manual correction
 */

import { NextRequest } from 'next/server';
import {
  errorResponse,
  ok,
  optionalNumber,
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
    const { tracker } = getServices();
    const since = optionalNumber(params, 'since');
    const playerId = optionalString(params, 'player_id');
    const statType = optionalString(params, 'stat_type');

    if (since !== undefined) {
      const changes = await tracker.getChanges(since, {
        playerId,
        statType: statType ? normalizeStatType(statType) : undefined,
      });
      return ok({ changes });
    }

    const pairPlayer = requireString(params, 'player_id');
    const pairStat = normalizeStatType(requireString(params, 'stat_type'));
    const [current, movement] = await Promise.all([
      tracker.getCurrentLine(pairPlayer, pairStat),
      tracker.getLineMovement(pairPlayer, pairStat),
    ]);
    return ok({ current, movement });
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { tracker } = getServices();
    const change = await tracker.recordLine(
      requireString(body, 'playerId'),
      normalizeStatType(requireString(body, 'statType')),
      requireNumber(body, 'value'),
      optionalNumber(body, 'timestamp')
    );
    return ok({ change });
  } catch (error) {
    return errorResponse(error);
  }
}

export async function PATCH(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { tracker } = getServices();
    const change = await tracker.editLine(
      requireString(body, 'playerId'),
      normalizeStatType(requireString(body, 'statType')),
      requireNumber(body, 'value')
    );
    return ok({ change });
  } catch (error) {
    return errorResponse(error);
  }
}
