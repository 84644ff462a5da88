import type { MetadataParser, MetadataTextSource } from '@domain/dmi-metadata/index.js';
import { describe, expect, it, vi } from 'vitest';

import {
  ParseMetadataCommand,
  ParseMetadataHandler,
} from '@/application/dmi-metadata/index.js';
import {
  DmiMetadataParserService,
  loadMetadata,
} from '@/infrastructure/dmi-metadata/index.js';

import { TWO_STATE_DOCUMENT } from '../../../fixtures/metadata-documents.js';
import { captureRejection } from '../../../helpers/capture-error.js';

describe('ParseMetadataHandler', () => {
  it('parses inline metadata text', async () => {
    const parser: MetadataParser = {
      parse: vi.fn((text: string) => loadMetadata(text)),
    };

    const handler = new ParseMetadataHandler(parser);
    const metadata = await handler.execute(
      new ParseMetadataCommand({ id: 'req-1', source: { type: 'text', text: TWO_STATE_DOCUMENT } }),
    );

    expect(parser.parse).toHaveBeenCalledTimes(1);
    expect(parser.parse).toHaveBeenCalledWith(TWO_STATE_DOCUMENT);
    expect(metadata.header.width).toBe(32);
    expect(metadata.states).toHaveLength(2);
  });

  it('reads container metadata through the text source', async () => {
    const textSource: MetadataTextSource = {
      readMetadataText: vi.fn(async () => TWO_STATE_DOCUMENT),
    };

    const handler = new ParseMetadataHandler(new DmiMetadataParserService({ cacheEntries: 0 }), textSource);
    const metadata = await handler.execute(
      new ParseMetadataCommand({ id: 'req-2', source: { type: 'container', uri: 'icons/mob.dmi' } }),
    );

    expect(textSource.readMetadataText).toHaveBeenCalledWith('icons/mob.dmi');
    expect(metadata.states[1].name).toBe('state2');
  });

  it('rejects container sources when no reader is configured', async () => {
    const handler = new ParseMetadataHandler(new DmiMetadataParserService({ cacheEntries: 0 }));

    const error = await captureRejection(
      handler.execute(
        new ParseMetadataCommand({ id: 'req-3', source: { type: 'container', uri: 'icons/mob.dmi' } }),
      ),
    );

    expect(error.code).toBe('dmi-metadata.unsupported-source');
    expect(error.metadata).toEqual({ requestId: 'req-3', uri: 'icons/mob.dmi' });
  });

  it('throws validation error when payload is invalid', async () => {
    const parser: MetadataParser = {
      parse: vi.fn((text: string) => loadMetadata(text)),
    };

    const handler = new ParseMetadataHandler(parser);
    const command = new ParseMetadataCommand({ id: '', source: { type: 'text', text: '' } });

    const error = await captureRejection(handler.execute(command));

    expect(error.code).toBe('dmi-metadata.invalid-payload');
    expect(error.message).toBe('Validation failed for the provided payload.');
    expect(parser.parse).not.toHaveBeenCalled();
  });

  it('surfaces parse failures as AppError', async () => {
    const handler = new ParseMetadataHandler(new DmiMetadataParserService({ cacheEntries: 0 }));
    const command = new ParseMetadataCommand({
      id: 'req-4',
      source: { type: 'text', text: TWO_STATE_DOCUMENT.replace('    dirs = 4', '    dirs = 2') },
    });

    const error = await captureRejection(handler.execute(command));

    expect(error.code).toBe('dmi-metadata.validation');
    expect(error.failureKind).toBe('validation');
    expect(error.metadata).toMatchObject({ line: 6, column: 12 });
  });
});
