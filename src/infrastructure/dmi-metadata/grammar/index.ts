export * from './block-assembler.js';
export * from './key-value.js';
export * from './line-cursor.js';
export * from './metadata-document.js';
export * from './scan-result.js';
export * from './value-lexer.js';
