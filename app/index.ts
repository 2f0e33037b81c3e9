/**
 * taskmint
 *
 * Task-wrapper factories with source-derived cache identities.
 */

export * from './config/index';
export * from './task/index';
export { Logger, logger, type LogLevel, type LogFields, type LogSink } from './utils/logger';
