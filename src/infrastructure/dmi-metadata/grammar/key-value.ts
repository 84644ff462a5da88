import {
  describeValue,
  isKnownKey,
  keyName,
  toDirectionCount,
  type IntegerKey,
  type Key,
  type KeyValue,
  type Value,
} from '../../../domain/dmi-metadata/index.js';
import { AppError } from '../../../shared/errors/app-error.js';

import { matched, mismatch, rejected, type ScanResult } from './scan-result.js';
import { lexValue } from './value-lexer.js';

const KEY = /[A-Za-z]+/y;
const SEPARATOR = ' = ';
const MAX_UNSIGNED = 0xffff_ffff;

export function lexKey(source: string, start: number): ScanResult<Key> {
  KEY.lastIndex = start;
  const match = KEY.exec(source);

  if (!match) {
    return mismatch(start, 'Expected a key');
  }

  const name = match[0];
  const key: Key = isKnownKey(name) ? { type: name } : { type: 'unknown', name };
  return matched(key, start + name.length);
}

function expected(key: Key, shape: string, value: Value): string {
  return `Key \`${keyName(key)}\` expects ${shape} but got ${describeValue(value)}`;
}

function unsigned(key: IntegerKey, value: Value): KeyValue | string {
  if (
    value.type !== 'int' ||
    value.value < 0 ||
    Object.is(value.value, -0) ||
    value.value > MAX_UNSIGNED
  ) {
    return expected({ type: key }, 'a non-negative integer', value);
  }

  return { key, value: value.value };
}

/**
 * Pairs a key with its value, enforcing the one value shape each known key
 * accepts. Returns a description of the mismatch when the pair is invalid.
 */
export function typeKeyValue(key: Key, value: Value): KeyValue | string {
  switch (key.type) {
    case 'unknown':
      return { key: 'unknown', name: key.name, value };
    case 'version':
      return value.type === 'float'
        ? { key: 'version', value: value.value }
        : expected(key, 'a decimal number', value);
    case 'state':
      return value.type === 'string'
        ? { key: 'state', value: value.value }
        : expected(key, 'a quoted string', value);
    case 'dirs': {
      if (value.type !== 'int') {
        return expected(key, 'an integer', value);
      }

      const dirs = toDirectionCount(value.value);
      return dirs === undefined
        ? `Invalid value ${value.value} for \`dirs\`, expected 1, 4 or 8`
        : { key: 'dirs', value: dirs };
    }
    case 'delay':
    case 'hotspot':
      return value.type === 'list'
        ? { key: key.type, value: value.value }
        : expected(key, 'a comma-separated list', value);
    case 'width':
    case 'height':
    case 'frames':
    case 'loop':
    case 'rewind':
    case 'movement':
      return unsigned(key.type, value);
  }
}

/**
 * Recognizes `<key> = <value>` starting at `start`. The text after the value
 * is left to the caller.
 */
export function recognizeKeyValue(source: string, start: number): ScanResult<KeyValue> {
  const key = lexKey(source, start);
  if (!key.success) {
    return key;
  }

  if (!source.startsWith(SEPARATOR, key.end)) {
    return mismatch(key.end, `Expected "${SEPARATOR}" after key \`${keyName(key.value)}\``);
  }

  const valueStart = key.end + SEPARATOR.length;
  const value = lexValue(source, valueStart);
  if (!value.success) {
    return value;
  }

  const pair = typeKeyValue(key.value, value.value);
  if (typeof pair === 'string') {
    return rejected(valueStart, pair);
  }

  return matched(pair, value.end);
}

/**
 * Parses a single `key = value` line (without indentation or line break).
 */
export function parseKeyValue(line: string): KeyValue {
  const result = recognizeKeyValue(line, 0);

  if (!result.success) {
    throw AppError.invalidMetadata(result.kind, `${result.reason}: \`${line}\``, {
      column: result.index + 1,
      fragment: line,
    });
  }

  if (result.end !== line.length) {
    throw AppError.invalidMetadata('grammar', `Unexpected trailing input: \`${line}\``, {
      column: result.end + 1,
      fragment: line,
    });
  }

  return result.value;
}
