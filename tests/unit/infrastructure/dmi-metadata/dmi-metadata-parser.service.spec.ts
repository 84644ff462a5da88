import { describe, expect, it } from 'vitest';

import { DmiMetadataParserService } from '@/infrastructure/dmi-metadata/index.js';
import { AppError } from '@/shared/errors/app-error.js';

import { TWO_STATE_DOCUMENT } from '../../../fixtures/metadata-documents.js';
import { captureAppError } from '../../../helpers/capture-error.js';

describe('DmiMetadataParserService', () => {
  it('returns the cached metadata for identical text', () => {
    const parser = new DmiMetadataParserService({ cacheEntries: 4 });

    const first = parser.parse(TWO_STATE_DOCUMENT);
    const second = parser.parse(TWO_STATE_DOCUMENT);

    expect(second).toBe(first);
  });

  it('parses again when the cache is disabled', () => {
    const parser = new DmiMetadataParserService({ cacheEntries: 0 });

    const first = parser.parse(TWO_STATE_DOCUMENT);
    const second = parser.parse(TWO_STATE_DOCUMENT);

    expect(second).not.toBe(first);
    expect(second.states.map((state) => state.name)).toEqual(['state1', 'state2']);
  });

  it('falls back to the configured cache size when an option is left undefined', () => {
    const parser = new DmiMetadataParserService({ cacheEntries: undefined, cacheTtlMs: undefined });

    const first = parser.parse(TWO_STATE_DOCUMENT);
    const second = parser.parse(TWO_STATE_DOCUMENT);

    expect(second).toBe(first);
  });

  it.each([
    [{ cacheEntries: 2.5 }, 'cacheEntries'],
    [{ cacheEntries: -1 }, 'cacheEntries'],
    [{ cacheTtlMs: 0 }, 'cacheTtlMs'],
  ])('rejects invalid options %o', (options, field) => {
    const error = captureAppError(() => new DmiMetadataParserService(options));

    expect(error.code).toBe('dmi-metadata.invalid-options');
    expect(error.message).toBe('Validation failed for the provided payload.');
    expect(error.metadata.issues).toEqual([expect.objectContaining({ path: [field] })]);
  });

  it('propagates parse failures', () => {
    const parser = new DmiMetadataParserService();

    expect(() => parser.parse('# BEGIN DMI')).toThrow(AppError);
    expect(() => parser.parse('# BEGIN DMI')).toThrow('Expected `# BEGIN DMI` on its own line');
  });
});
