export const dynamic = 'force-dynamic';

/**
 * Parlay calculator
 * POST { legs: [{ label, probability, americanOdds? }], marketAmericanOdds? }
 */

import { NextRequest } from 'next/server';
import { errorResponse, ok, optionalNumber, readJsonBody, requireNumber } from '@/lib/apiResponses';
import { InvalidInputError } from '@/lib/errors';
import { asString, getField } from '@/lib/json';
import { calculate } from '@/lib/parlay/calculator';
import type { ParlayLeg } from '@/lib/parlay/types';

function parseLegs(body: unknown): ParlayLeg[] {
  const legs = getField(body, 'legs');
  if (!Array.isArray(legs)) {
    throw new InvalidInputError('legs must be an array of { label, probability, americanOdds? }');
  }
  return legs.map((leg, index) => {
    const americanOdds = optionalNumber(leg, 'americanOdds');
    return {
      label: asString(getField(leg, 'label')) ?? `Leg ${index + 1}`,
      probability: requireNumber(leg, 'probability'),
      ...(americanOdds !== undefined ? { americanOdds } : {}),
    };
  });
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const result = calculate(parseLegs(body), {
      marketAmericanOdds: optionalNumber(body, 'marketAmericanOdds'),
    });
    return ok(result);
  } catch (error) {
    return errorResponse(error);
  }
}
