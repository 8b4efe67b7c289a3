// Navigation Library Exports
export * from './config';
export * from './normalizer';
export * from './partition';
export * from './decision';
export * from './scoring';
export * from './announcements';
export * from './partitionGate';
export * from './legacyGate';
export * from './strategies';
export * from './session';

// Re-export speech output
export * from '../speech/arbiter';
export * from '../speech/speechQueue';
export * from '../speech/closestObjectNarrator';
export * from '../speech/sceneNarrator';

export { createLogger, silentLogger, isDebugEnabled } from '../logger';
export type { Logger, LoggerOptions } from '../logger';
export { ManualClock, systemClock } from '../clock';
export * from '@/types/navigation';
