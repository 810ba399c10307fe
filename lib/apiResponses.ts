import { NextResponse } from 'next/server';
import { InvalidInputError, toErrorResponse } from './errors';
import { asNumber, getField } from './json';
import { createLogger } from './logger';
import type { PropRequest } from './edge-engine/types';

const log = createLogger('API');

export function errorResponse(error: unknown): NextResponse {
  const { body, status } = toErrorResponse(error);
  if (status >= 500) {
    log.error(`Request failed: ${body.error}`, error);
  }
  return NextResponse.json({ success: false, ...body }, { status });
}

export function ok<T>(data: T, status = 200): NextResponse {
  return NextResponse.json({ success: true, data }, { status });
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new InvalidInputError('Request body must be valid JSON');
  }
}

export function requireString(source: unknown, name: string): string {
  const value = getField(source, name);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidInputError(`${name} is required`);
  }
  return value.trim();
}

export function requireNumber(source: unknown, name: string): number {
  const value = asNumber(getField(source, name));
  if (value === null) {
    throw new InvalidInputError(`${name} must be a number`);
  }
  return value;
}

export function optionalNumber(source: unknown, name: string): number | undefined {
  const raw = getField(source, name);
  if (raw === undefined || raw === null || raw === '') return undefined;
  const value = asNumber(raw);
  if (value === null) {
    throw new InvalidInputError(`${name} must be a number`);
  }
  return value;
}

export function optionalString(source: unknown, name: string): string | undefined {
  const value = getField(source, name);
  return typeof value === 'string' ? value : undefined;
}

// Query strings as a plain object so the same readers work for GET and JSON bodies
export function queryParams(request: Request): Record<string, string> {
  return Object.fromEntries(new URL(request.url).searchParams.entries());
}

export function parseProps(source: unknown): PropRequest[] {
  const props = getField(source, 'props');
  if (!Array.isArray(props)) {
    throw new InvalidInputError('props must be an array of { playerId, statType, line }');
  }
  return props.map(prop => ({
    playerId: requireString(prop, 'playerId'),
    statType: requireString(prop, 'statType'),
    line: requireNumber(prop, 'line'),
  }));
}
