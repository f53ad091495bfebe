// Programmatic API
export { loadConfig, documentPath, POLL_INTERVAL_MS, DOCUMENT_FILE, type Config } from './config/index.js';
export { createPollLoop } from './app.js';
export { createLogger, formatLogLine, type Logger, type LogLevel, type LogEntry } from './logger.js';
export * from './errors.js';

export * from './services/lastfm/index.js';
export * from './services/document/index.js';
export * from './services/git/index.js';
export * from './services/poll/index.js';
