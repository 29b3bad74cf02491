// Library exports only - no worker execution
export * from './config.js';
export * from './errors.js';
export * from './services/asset.js';
export * from './services/audio.service.js';
export * from './services/audio-splitter.js';
export * from './services/chunk-planner.js';
export * from './services/chunk-orchestrator.js';
export * from './services/size-threshold.js';
export * from './services/transcription.service.js';
export * from './services/transcription.factory.js';
export * from './services/transcript-store.js';
export * from './jobs/job.store.js';
export * from './jobs/job.processor.js';
