export { logger, createComponentLogger, flushLogs } from './logger';
export { config } from './config';
export type { Config, LoggingConfig, OutputConfig } from './config';
export { discoverSourceFiles } from './file-discovery';
export type { DiscoveryOptions } from './file-discovery';
