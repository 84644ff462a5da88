export * from './commands/parse-metadata.command.js';
export * from './dto/parse-metadata.dto.js';
export * from './handlers/parse-metadata.handler.js';
