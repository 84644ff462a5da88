import { createHash } from 'node:crypto';

import { z } from 'zod';

import type { Metadata, MetadataParser } from '../../domain/dmi-metadata/index.js';
import { getEnv } from '../../shared/config/env.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';

import { MemoryCache } from './cache/memory-cache.js';
import { loadMetadata } from './grammar/metadata-document.js';

export interface DmiMetadataParserOptions {
  /** Number of parsed documents kept in memory; 0 disables the cache. */
  readonly cacheEntries?: number;
  readonly cacheTtlMs?: number;
}

const parserOptionsSchema = z.object({
  cacheEntries: z.number().int().min(0),
  cacheTtlMs: z.number().int().positive(),
});

export class DmiMetadataParserService implements MetadataParser {
  private readonly logger = createChildLogger({ module: 'DmiMetadataParserService' });

  private readonly cache?: MemoryCache<Metadata>;

  public constructor(options: DmiMetadataParserOptions = {}) {
    const env = getEnv();
    const parsed = parserOptionsSchema.safeParse({
      cacheEntries: options.cacheEntries ?? env.DMI_PARSER_CACHE_ENTRIES,
      cacheTtlMs: options.cacheTtlMs ?? env.DMI_PARSER_CACHE_TTL_MS,
    });

    if (!parsed.success) {
      throw AppError.validation('dmi-metadata.invalid-options', {
        issues: parsed.error.issues,
      });
    }

    const { cacheEntries, cacheTtlMs } = parsed.data;
    if (cacheEntries > 0) {
      this.cache = new MemoryCache<Metadata>({ maxEntries: cacheEntries, ttlMs: cacheTtlMs });
    }
  }

  public parse(text: string): Metadata {
    if (!this.cache) {
      return loadMetadata(text);
    }

    const cacheKey = createHash('sha256').update(text).digest('hex');
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.logger.debug({ cacheKey }, 'Returning cached metadata');
      return cached.value;
    }

    const metadata = loadMetadata(text);
    this.cache.set(cacheKey, metadata);
    return metadata;
  }
}
