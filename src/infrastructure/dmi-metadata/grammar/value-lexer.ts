import type { Value } from '../../../domain/dmi-metadata/index.js';

import { matched, mismatch, type ScanResult } from './scan-result.js';

const DECIMAL = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const INTEGER = /^[+-]?\d+$/;

const QUOTE = '"';
const LIST_SEPARATOR = ',';
const OUT_OF_RANGE = 'Number out of range';

/**
 * Recognizes the decimal literal starting at `start`.
 */
export function lexDecimal(source: string, start: number): ScanResult<string> {
  DECIMAL.lastIndex = start;
  const match = DECIMAL.exec(source);

  if (!match) {
    return mismatch(start, 'Expected a number');
  }

  return matched(match[0], start + match[0].length);
}

function lexString(source: string, start: number): ScanResult<Value> {
  const close = source.indexOf(QUOTE, start + 1);

  if (close === -1) {
    return mismatch(start, 'Unterminated string literal');
  }

  return matched({ type: 'string', value: source.slice(start + 1, close) }, close + 1);
}

function toFinite(literal: string): number | undefined {
  const value = Number(literal);
  return Number.isFinite(value) ? value : undefined;
}

function lexList(source: string, first: number, start: number): ScanResult<Value> {
  const items = [first];
  let end = start;

  while (source[end] === LIST_SEPARATOR) {
    const item = lexDecimal(source, end + 1);
    if (!item.success) {
      return mismatch(item.index, `Expected a number after '${LIST_SEPARATOR}'`);
    }

    const value = toFinite(item.value);
    if (value === undefined) {
      return mismatch(end + 1, OUT_OF_RANGE);
    }

    items.push(value);
    end = item.end;
  }

  return matched({ type: 'list', value: items }, end);
}

/**
 * Recognizes one literal: a quoted string, an integer, a decimal, or a
 * comma-separated list of decimals. A lone number is never a list.
 */
export function lexValue(source: string, start: number): ScanResult<Value> {
  if (source[start] === QUOTE) {
    return lexString(source, start);
  }

  const scalar = lexDecimal(source, start);
  if (!scalar.success) {
    return mismatch(start, 'Expected a string, number or list');
  }

  const value = toFinite(scalar.value);
  if (value === undefined) {
    return mismatch(start, OUT_OF_RANGE);
  }

  if (source[scalar.end] === LIST_SEPARATOR) {
    return lexList(source, value, scalar.end);
  }

  if (INTEGER.test(scalar.value)) {
    // Integers must survive the round trip through a double.
    return Number.isSafeInteger(value)
      ? matched({ type: 'int', value }, scalar.end)
      : mismatch(start, 'Integer out of range');
  }

  return matched({ type: 'float', value }, scalar.end);
}
