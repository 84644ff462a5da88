/**
 * Reads the metadata text embedded in a DMI container (the PNG `zTXt`
 * `Description` chunk). Container decoding lives outside this package.
 */
export interface MetadataTextSource {
  readMetadataText(uri: string): Promise<string>;
}
