import type { Metadata } from '../entities/metadata.js';

export interface MetadataParser {
  /** Parses a whole metadata document. Throws `AppError` on the first violation. */
  parse(text: string): Metadata;
}
