/**
 * Storage backends for the TTL cache
 * Memory (per process) and file-backed (one JSON file per key); see supabaseStores.ts for the shared backend
 */

import fs from 'fs/promises';
import path from 'path';
import { createLogger } from './logger';

const log = createLogger('Cache Store');

export interface CacheEntry<T> {
  key: string;
  payload: T;
  /** Epoch seconds when the payload was fetched. */
  fetchedAt: number;
  /** Time-to-live in seconds. */
  ttl: number;
}

export interface CacheStore<T> {
  get(key: string): Promise<CacheEntry<T> | null>;
  set(entry: CacheEntry<T>): Promise<void>;
  delete(key: string): Promise<boolean>;
  entries(): Promise<CacheEntry<T>[]>;
}

export type PayloadGuard<T> = (payload: unknown) => payload is T;

export function isNumberArray(payload: unknown): payload is number[] {
  return Array.isArray(payload) && payload.every(v => typeof v === 'number' && Number.isFinite(v));
}

export class MemoryCacheStore<T> implements CacheStore<T> {
  private entriesByKey = new Map<string, CacheEntry<T>>();

  async get(key: string): Promise<CacheEntry<T> | null> {
    return this.entriesByKey.get(key) ?? null;
  }

  async set(entry: CacheEntry<T>): Promise<void> {
    this.entriesByKey.set(entry.key, entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.entriesByKey.delete(key);
  }

  async entries(): Promise<CacheEntry<T>[]> {
    return Array.from(this.entriesByKey.values());
  }
}

// Keep keys filesystem-safe
export function sanitizeCacheKey(key: string): string {
  return key.replace(/[^a-zA-Z0-9_-]/g, '_');
}

/**
 * File-backed store: <dir>/<sanitized key>.json holding { key, payload, fetchedAt, ttl }.
 * Files that fail to parse or validate are treated as absent.
 */
export class FileCacheStore<T> implements CacheStore<T> {
  private readonly dir: string;
  private readonly isPayload: PayloadGuard<T>;

  constructor(dir: string, isPayload: PayloadGuard<T>) {
    this.dir = dir;
    this.isPayload = isPayload;
  }

  private filePath(key: string): string {
    return path.join(this.dir, `${sanitizeCacheKey(key)}.json`);
  }

  private parseEntry(raw: string, file: string): CacheEntry<T> | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn(`Ignoring unreadable cache file ${file}`, error);
      return null;
    }

    if (typeof parsed !== 'object' || parsed === null) return null;
    const key = 'key' in parsed ? parsed.key : undefined;
    const payload = 'payload' in parsed ? parsed.payload : undefined;
    const fetchedAt = 'fetchedAt' in parsed ? parsed.fetchedAt : undefined;
    const ttl = 'ttl' in parsed ? parsed.ttl : undefined;

    if (typeof key !== 'string' || typeof fetchedAt !== 'number' || typeof ttl !== 'number' || !this.isPayload(payload)) {
      log.warn(`Ignoring malformed cache file ${file}`);
      return null;
    }
    return { key, payload, fetchedAt, ttl };
  }

  async get(key: string): Promise<CacheEntry<T> | null> {
    const file = this.filePath(key);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    const entry = this.parseEntry(raw, file);
    // Two keys can sanitize to the same file name
    return entry && entry.key === key ? entry : null;
  }

  async set(entry: CacheEntry<T>): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const file = this.filePath(entry.key);
    // Write then rename so readers see the old file or the new one, never a partial write
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(entry, null, 2), 'utf8');
    await fs.rename(tmp, file);
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.filePath(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async entries(): Promise<CacheEntry<T>[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const out: CacheEntry<T>[] = [];
    for (const name of files) {
      if (!name.endsWith('.json')) continue;
      const file = path.join(this.dir, name);
      try {
        const entry = this.parseEntry(await fs.readFile(file, 'utf8'), file);
        if (entry) out.push(entry);
      } catch (error) {
        // Removed between readdir and readFile
        if (!isNotFound(error)) throw error;
      }
    }
    return out;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
