import {
  formatKeyValue,
  Header,
  State,
  type KeyValue,
  type KeyValueOf,
} from '../../../domain/dmi-metadata/index.js';
import { AppError } from '../../../shared/errors/app-error.js';

import { recognizeKeyValue } from './key-value.js';
import type { LineCursor, SourceLine } from './line-cursor.js';

type IntroducerKey = 'version' | 'state';

const INDENT = /^[ \t]+/;

/**
 * Reads one `key = value` line starting at `column`, requiring the pair to
 * span the rest of the line and the line to end in `\n`.
 */
export function readKeyValueLine(cursor: LineCursor, line: SourceLine, column: number): KeyValue {
  const result = recognizeKeyValue(line.text, column);

  if (!result.success) {
    throw cursor.failAt(line, result.index, result.kind, result.reason);
  }

  if (result.end !== line.text.length) {
    throw cursor.failAt(line, result.end, 'grammar', 'Unexpected trailing input');
  }

  if (!line.terminated) {
    throw cursor.failAt(line, line.text.length, 'grammar', 'Expected a line break');
  }

  return result.value;
}

function isIntroducer<K extends IntroducerKey>(
  pair: KeyValue,
  key: K,
): pair is KeyValueOf<K> {
  return pair.key === key;
}

/**
 * Consumes an introducer line followed by its indented property lines and
 * builds the record from them. A block needs at least one property; the run
 * of properties ends at the first line without leading whitespace.
 */
export function assembleBlock<K extends IntroducerKey, T>(
  cursor: LineCursor,
  key: K,
  build: (introducer: KeyValueOf<K>, properties: readonly KeyValue[]) => T,
): T {
  const first = cursor.peek();
  if (first === undefined) {
    throw cursor.failAtEnd(`Expected a \`${key} = ...\` line`);
  }

  const introducer = readKeyValueLine(cursor, first, 0);
  if (!isIntroducer(introducer, key)) {
    throw cursor.failAt(
      first,
      0,
      'grammar',
      `Expected a \`${key} = ...\` line but found \`${formatKeyValue(introducer)}\``,
    );
  }

  cursor.advance(first);

  const properties: KeyValue[] = [];
  for (let line = cursor.peek(); line !== undefined; line = cursor.peek()) {
    const indent = INDENT.exec(line.text);
    if (!indent) {
      break;
    }

    properties.push(readKeyValueLine(cursor, line, indent[0].length));
    cursor.advance(line);
  }

  if (properties.length === 0) {
    const next = cursor.peek();
    const reason = `Expected at least one indented property after \`${formatKeyValue(introducer)}\``;
    throw next === undefined ? cursor.failAtEnd(reason) : cursor.failAt(next, 0, 'grammar', reason);
  }

  try {
    return build(introducer, properties);
  } catch (error) {
    const failure = AppError.fromUnknown(error, 'dmi-metadata.validation');
    throw cursor.failAt(first, 0, 'validation', failure.message, failure);
  }
}

export function assembleHeader(cursor: LineCursor): Header {
  return assembleBlock(cursor, 'version', (introducer, properties) =>
    Header.fromProperties(introducer.value, properties),
  );
}

export function assembleState(cursor: LineCursor): State {
  return assembleBlock(cursor, 'state', (introducer, properties) =>
    State.fromProperties(introducer.value, properties),
  );
}
