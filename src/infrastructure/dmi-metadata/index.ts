export * from './dmi-metadata-parser.service.js';
export * from './grammar/index.js';
