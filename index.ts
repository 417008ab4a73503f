/**
 * Rankings Harvester - Library Entry Point
 *
 * Incrementally harvests date-specific ranking tables into a deduplicated
 * master CSV. The command-line tool lives in scripts/harvest.ts.
 */

export * from './core/types';
export * from './core/dates';
export { configureLogger, createLogger, safeErrorData, type Logger, type LogFormat, type LogLevel } from './core/logger';
export * from './config';
export * from './engine/cutoff';
export * from './engine/gap-planner';
export * from './engine/worker-pool';
export * from './engine/merge';
export * from './engine/harvest';
export * from './fetchers';
export * from './store/master-file';
