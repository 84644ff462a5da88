import type { ParseMetadataPayload } from '../dto/parse-metadata.dto.js';

export class ParseMetadataCommand {
  public readonly payload: ParseMetadataPayload;

  public constructor(payload: ParseMetadataPayload) {
    this.payload = payload;
  }
}
