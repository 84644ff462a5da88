import { Metadata, type State } from '../../../domain/dmi-metadata/index.js';
import { AppError } from '../../../shared/errors/app-error.js';

import { assembleHeader, assembleState } from './block-assembler.js';
import { LineCursor } from './line-cursor.js';

export const BEGIN_MARKER = '# BEGIN DMI';
export const END_MARKER = '# END DMI';

const TRAILING_WHITESPACE = /^[ \t\r\n]*$/;

export type MetadataParseResult =
  | { readonly success: true; readonly metadata: Metadata }
  | { readonly success: false; readonly error: AppError };

function expectBegin(cursor: LineCursor): void {
  const line = cursor.peek();
  if (line === undefined) {
    throw cursor.failAtEnd(`Expected \`${BEGIN_MARKER}\``);
  }

  if (line.text !== BEGIN_MARKER || !line.terminated) {
    throw cursor.failAt(line, 0, 'grammar', `Expected \`${BEGIN_MARKER}\` on its own line`);
  }

  cursor.advance(line);
}

function expectEnd(cursor: LineCursor): void {
  const rest = cursor.remaining.slice(END_MARKER.length);
  if (TRAILING_WHITESPACE.test(rest)) {
    return;
  }

  const offset = cursor.position + END_MARKER.length + rest.search(/[^ \t\r\n]/);
  const { line, column } = cursor.locate(offset);
  throw AppError.invalidMetadata(
    'grammar',
    `Unexpected input after \`${END_MARKER}\` at line ${line}, column ${column}`,
    { line, column, fragment: rest.trim().split('\n')[0] },
  );
}

/**
 * Parses a complete metadata document: the begin marker, the header block,
 * any number of state blocks and the end marker. Only whitespace may follow
 * the end marker. Throws `AppError` describing the first violation.
 */
export function loadMetadata(text: string): Metadata {
  const cursor = new LineCursor(text);

  expectBegin(cursor);
  const header = assembleHeader(cursor);

  const states: State[] = [];
  for (;;) {
    const line = cursor.peek();
    if (line === undefined) {
      throw cursor.failAtEnd(`Expected \`${END_MARKER}\``);
    }

    if (line.text.startsWith(END_MARKER)) {
      break;
    }

    states.push(assembleState(cursor));
  }

  expectEnd(cursor);
  return Metadata.create(header, states);
}

export function parseMetadata(text: string): MetadataParseResult {
  try {
    return { success: true, metadata: loadMetadata(text) };
  } catch (error) {
    return { success: false, error: AppError.fromUnknown(error, 'dmi-metadata.failure') };
  }
}
