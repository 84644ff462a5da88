/**
 * Literal found on the right-hand side of a `key = value` line.
 */
export type Value =
  | { readonly type: 'int'; readonly value: number }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'list'; readonly value: readonly number[] };

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** Renders a value the way it would appear in a metadata document. */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'int':
      return Object.is(value.value, -0) ? '-0' : String(value.value);
    case 'float':
      return formatNumber(value.value);
    case 'string':
      return `"${value.value}"`;
    case 'list':
      return value.value.map((item) => String(item)).join(',');
  }
}

export function describeValue(value: Value): string {
  return `${value.type} ${formatValue(value)}`;
}
