export * from './application/dmi-metadata/index.js';
export * from './domain/dmi-metadata/index.js';
export * from './infrastructure/dmi-metadata/index.js';
export { AppError, type MetadataFailureKind } from './shared/errors/app-error.js';
export {
  calculateFrameTimingStats,
  stateFrameDelaysMs,
  TICK_MS,
  type FrameTimingStats,
} from './shared/media/frameTiming.js';
