export * from './contracts/metadata-parser.js';
export * from './contracts/metadata-text-source.js';
export * from './entities/header.js';
export * from './entities/metadata.js';
export * from './entities/state.js';
export * from './value-objects/direction-count.js';
export * from './value-objects/key-value.js';
export * from './value-objects/value.js';
