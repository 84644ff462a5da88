import { describe, expect, it } from 'vitest';

import { DirectionCount } from '@domain/dmi-metadata/index.js';
import {
  loadMetadata,
  parseMetadata,
} from '@/infrastructure/dmi-metadata/grammar/metadata-document.js';

import {
  FULL_STATE_DOCUMENT,
  lines,
  TWO_STATE_DOCUMENT,
} from '../../../../fixtures/metadata-documents.js';
import { captureAppError } from '../../../../helpers/capture-error.js';

describe('loadMetadata', () => {
  it('parses the header and states in input order', () => {
    const metadata = loadMetadata(TWO_STATE_DOCUMENT);

    expect(metadata.header.version).toBe(4);
    expect(metadata.header.width).toBe(32);
    expect(metadata.header.height).toBe(32);
    expect(metadata.header.unknown).toBeUndefined();

    expect(metadata.states.map((state) => state.name)).toEqual(['state1', 'state2']);
    expect(metadata.states[0].dirs).toBe(DirectionCount.Four);
    expect(metadata.states[0].frames).toBe(2);
    expect(metadata.states[0].delays).toEqual([1.2, 1]);
    expect(metadata.states[1].dirs).toBe(DirectionCount.One);
    expect(metadata.states[1].frames).toBe(1);
    expect(metadata.states[1].delays).toBeUndefined();
  });

  it('reads every state property', () => {
    const [state] = loadMetadata(FULL_STATE_DOCUMENT).states;

    expect(state.movement).toBe(1);
    expect(state.loopFlag).toBe(1);
    expect(state.rewind).toBe(0);
    expect(state.hotspot).toEqual([12, 13, 0]);
    expect(state.unknown?.get('future')).toEqual({ type: 'string', value: 'lmao' });
  });

  it('accepts a document without states', () => {
    const metadata = loadMetadata(
      lines('# BEGIN DMI', 'version = 4.0', '    width = 1', '    height = 1', '# END DMI'),
    );

    expect(metadata.states).toEqual([]);
  });

  it('keeps states with duplicate names', () => {
    const metadata = loadMetadata(
      lines(
        '# BEGIN DMI',
        'version = 4.0',
        '    width = 32',
        '    height = 32',
        'state = "x"',
        '    dirs = 1',
        'state = "x"',
        '    dirs = 4',
        '# END DMI',
      ),
    );

    expect(metadata.statesNamed('x').map((state) => state.dirs)).toEqual([
      DirectionCount.One,
      DirectionCount.Four,
    ]);
    expect(metadata.findState('x')).toBe(metadata.states[0]);
    expect(metadata.findState('y')).toBeUndefined();
  });

  it('discards whitespace after the end marker', () => {
    const metadata = loadMetadata(`${TWO_STATE_DOCUMENT}\n\n  \t\r\n`);

    expect(metadata.states).toHaveLength(2);
  });

  it('rejects input after the end marker', () => {
    const error = captureAppError(() => loadMetadata(`${TWO_STATE_DOCUMENT}\nextra`));

    expect(error.failureKind).toBe('grammar');
    expect(error.message).toBe('Unexpected input after `# END DMI` at line 13, column 1');
  });

  it('rejects text on the end marker line', () => {
    const error = captureAppError(() => loadMetadata(`${TWO_STATE_DOCUMENT} garbage`));

    expect(error.message).toBe('Unexpected input after `# END DMI` at line 12, column 11');
    expect(error.metadata.fragment).toBe('garbage');
  });

  it('requires the begin marker on the first line', () => {
    const error = captureAppError(() => loadMetadata(`\n${TWO_STATE_DOCUMENT}`));

    expect(error.message).toBe('Expected `# BEGIN DMI` on its own line at line 1, column 1: ``');
  });

  it('requires the end marker', () => {
    const text = lines('# BEGIN DMI', 'version = 4.0', '    width = 1', '    height = 1', '');

    const error = captureAppError(() => loadMetadata(text));

    expect(error.message).toBe('Expected `# END DMI` at line 5: end of input');
  });

  it('rejects documents with another version as a whole', () => {
    const result = parseMetadata(TWO_STATE_DOCUMENT.replace('version = 4.0', 'version = 5.0'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'Version 5.0 not supported, only 4.0 at line 2, column 1: `version = 5.0`',
      );
    }
  });

  it('reports the line of the failing state', () => {
    const text = TWO_STATE_DOCUMENT.replace('    dirs = 1', '    dirs = 3');

    const error = captureAppError(() => loadMetadata(text));

    expect(error.failureKind).toBe('validation');
    expect(error.message).toBe('Invalid value 3 for `dirs`, expected 1, 4 or 8 at line 10, column 12: `    dirs = 3`');
  });
});

describe('parseMetadata', () => {
  it('returns the metadata on success', () => {
    const result = parseMetadata(TWO_STATE_DOCUMENT);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.metadata.states).toHaveLength(2);
    }
  });

  it('returns the failure instead of throwing', () => {
    const result = parseMetadata('# BEGIN DMI\n');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('dmi-metadata.grammar');
      expect(result.error.message).toBe('Expected a `version = ...` line at line 2: end of input');
    }
  });
});
