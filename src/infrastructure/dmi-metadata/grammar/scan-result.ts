import type { MetadataFailureKind } from '../../../shared/errors/app-error.js';

/**
 * Outcome of running a recognizer at an index of a line. `end` is the index
 * just past the recognized text; `index` is where recognition failed.
 */
export type ScanResult<T> =
  | { readonly success: true; readonly value: T; readonly end: number }
  | {
      readonly success: false;
      readonly kind: MetadataFailureKind;
      readonly index: number;
      readonly reason: string;
    };

export type ScanFailure = Extract<ScanResult<unknown>, { readonly success: false }>;

export function matched<T>(value: T, end: number): ScanResult<T> {
  return { success: true, value, end };
}

export function mismatch(index: number, reason: string): ScanFailure {
  return { success: false, kind: 'grammar', index, reason };
}

export function rejected(index: number, reason: string): ScanFailure {
  return { success: false, kind: 'validation', index, reason };
}
