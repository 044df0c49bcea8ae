// src/index.ts

export * from './schema';
export * from './ast';

export * from './core/stanzas';
export * from './core/manifest';
export * from './core/readme';
export * from './core/version-map';
export * from './core/artifacts';
export * from './core/config-loader';
export * from './core/runner';
export * from './core/watcher';
export * from './core/init-brinefile';

export * from './util/errors';
export {Logger, defaultLogger, isLogLevel, type LogLevel, type LogSink, type LoggerOptions} from './util/logger';
