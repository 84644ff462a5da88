import type { DirectionCount } from './direction-count.js';
import { formatNumber, formatValue, type Value } from './value.js';

export const KNOWN_KEYS = [
  'version',
  'width',
  'height',
  'state',
  'dirs',
  'frames',
  'delay',
  'loop',
  'rewind',
  'movement',
  'hotspot',
] as const;

export type KnownKey = (typeof KNOWN_KEYS)[number];

/** Keys whose value is an unsigned 32-bit integer. */
export type IntegerKey = 'width' | 'height' | 'frames' | 'loop' | 'rewind' | 'movement';

export type ListKey = 'delay' | 'hotspot';

export type Key =
  | { readonly type: KnownKey }
  | { readonly type: 'unknown'; readonly name: string };

export type KeyValue =
  | { readonly key: 'version'; readonly value: number }
  | { readonly key: IntegerKey; readonly value: number }
  | { readonly key: 'state'; readonly value: string }
  | { readonly key: 'dirs'; readonly value: DirectionCount }
  | { readonly key: ListKey; readonly value: readonly number[] }
  | { readonly key: 'unknown'; readonly name: string; readonly value: Value };

export type KeyValueOf<K extends KeyValue['key']> = Extract<KeyValue, { readonly key: K }>;

export function isKnownKey(name: string): name is KnownKey {
  return KNOWN_KEYS.some((key) => key === name);
}

export function keyName(key: Key): string {
  return key.type === 'unknown' ? key.name : key.type;
}

export function formatKeyValue(pair: KeyValue): string {
  switch (pair.key) {
    case 'unknown':
      return `${pair.name} = ${formatValue(pair.value)}`;
    case 'version':
      return `version = ${formatNumber(pair.value)}`;
    case 'state':
      return `state = "${pair.value}"`;
    case 'delay':
    case 'hotspot':
      return `${pair.key} = ${pair.value.map((item) => String(item)).join(',')}`;
    default:
      return `${pair.key} = ${pair.value}`;
  }
}
