export const DirectionCount = {
  One: 1,
  Four: 4,
  Eight: 8,
} as const;

export type DirectionCount = (typeof DirectionCount)[keyof typeof DirectionCount];

const DIRECTION_COUNTS: readonly DirectionCount[] = Object.values(DirectionCount);

export function isDirectionCount(value: number): value is DirectionCount {
  return DIRECTION_COUNTS.some((count) => count === value);
}

export function toDirectionCount(value: number): DirectionCount | undefined {
  return isDirectionCount(value) ? value : undefined;
}
