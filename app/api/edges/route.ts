export const dynamic = 'force-dynamic';

/**
 * Edge API
 * GET  ?player_id=&stat_type=&line=[&threshold=&refresh=1]  - evaluate one prop
 * POST { props: [{ playerId, statType, line }], threshold?, parlays?,
 *        minProbability?, minEv?, minMarketEdge?, positiveEvOnly?, sortBy? } - scan a slate
 */

import { NextRequest } from 'next/server';
import {
  errorResponse,
  ok,
  optionalNumber,
  optionalString,
  parseProps,
  queryParams,
  readJsonBody,
  requireNumber,
  requireString,
} from '@/lib/apiResponses';
import { EDGE_SORTS, type EdgeSort, type ScanOptions } from '@/lib/edge-engine/runEdgeScan';
import { InvalidInputError } from '@/lib/errors';
import { getField } from '@/lib/json';
import { recommendParlays } from '@/lib/parlay/recommendations';
import { getServices } from '@/lib/services';

function parseSort(value: string | undefined): EdgeSort | undefined {
  if (value === undefined) return undefined;
  const sort = EDGE_SORTS.find(option => option === value);
  if (!sort) {
    throw new InvalidInputError(`sortBy must be one of ${EDGE_SORTS.join(', ')}`);
  }
  return sort;
}

function parseScanOptions(body: unknown): ScanOptions {
  return {
    threshold: optionalNumber(body, 'threshold'),
    minProbability: optionalNumber(body, 'minProbability'),
    minEv: optionalNumber(body, 'minEv'),
    minMarketEdge: optionalNumber(body, 'minMarketEdge'),
    positiveEvOnly: getField(body, 'positiveEvOnly') === true,
    sortBy: parseSort(optionalString(body, 'sortBy')),
  };
}

export async function GET(request: NextRequest) {
  try {
    const params = queryParams(request);
    const { edgeService } = getServices();

    const outcome = await edgeService.evaluateProp({
      playerId: requireString(params, 'player_id'),
      statType: requireString(params, 'stat_type'),
      line: requireNumber(params, 'line'),
      threshold: optionalNumber(params, 'threshold'),
      forceRefresh: params.refresh === '1' || params.refresh === 'true',
    });

    return ok(outcome);
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const props = parseProps(body);
    const { edgeService, config } = getServices();

    const scan = await edgeService.scanEdges(props, parseScanOptions(body));

    if (getField(body, 'parlays') !== true) {
      return ok(scan);
    }

    const edges = scan.edges.flatMap(outcome => (outcome.status === 'ok' ? [outcome.result] : []));
    const parlays = recommendParlays(edges, {
      minProbability: config.parlayMinProbability,
      legOdds: config.defaultLegOdds,
    });
    return ok({ ...scan, parlays });
  } catch (error) {
    return errorResponse(error);
  }
}
