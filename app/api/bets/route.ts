export const dynamic = 'force-dynamic';

/**
 * Bet journal
 * GET    ?pending=1&since=<epoch ms>                                      - bets and ROI summary
 * POST   { playerId, statType, line, pick, oddsPlaced, stake, platform?, probability? } - record a bet
 * PATCH  { id, actualStat, closingOdds? }                                  - settle
 * PATCH  { id, closingOdds }                                               - record closing odds only
 * DELETE ?id=
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
import { isPick } from '@/lib/bets/tracker';
import type { BetFilter } from '@/lib/bets/types';
import { InvalidInputError } from '@/lib/errors';
import { getField } from '@/lib/json';
import { getServices } from '@/lib/services';

export async function GET(request: NextRequest) {
  try {
    const params = queryParams(request);
    const filter: BetFilter = {
      pendingOnly: params.pending === '1' || params.pending === 'true',
      since: optionalNumber(params, 'since'),
    };
    const { bets } = getServices();
    const [entries, roi] = await Promise.all([bets.listBets(filter), bets.getRoi(filter)]);
    return ok({ bets: entries, roi });
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const pick = requireString(body, 'pick').toUpperCase();
    if (!isPick(pick)) {
      throw new InvalidInputError('pick must be OVER or UNDER');
    }

    const bet = await getServices().bets.addBet({
      playerId: requireString(body, 'playerId'),
      statType: requireString(body, 'statType'),
      line: requireNumber(body, 'line'),
      pick,
      oddsPlaced: requireNumber(body, 'oddsPlaced'),
      stake: requireNumber(body, 'stake'),
      platform: optionalString(body, 'platform'),
      probability: optionalNumber(body, 'probability'),
    });
    return ok(bet, 201);
  } catch (error) {
    return errorResponse(error);
  }
}

export async function PATCH(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const { bets } = getServices();
    const id = requireString(body, 'id');
    const closingOdds = optionalNumber(body, 'closingOdds');

    if (getField(body, 'actualStat') === undefined) {
      if (closingOdds === undefined) {
        throw new InvalidInputError('actualStat or closingOdds is required');
      }
      return ok(await bets.updateClosingOdds(id, closingOdds));
    }
    return ok(await bets.settleBet(id, requireNumber(body, 'actualStat'), closingOdds));
  } catch (error) {
    return errorResponse(error);
  }
}

export async function DELETE(request: NextRequest) {
  try {
    const removed = await getServices().bets.deleteBet(requireString(queryParams(request), 'id'));
    return ok({ removed });
  } catch (error) {
    return errorResponse(error);
  }
}
