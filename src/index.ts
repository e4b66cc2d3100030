export * from './components/drawer';
export { Logger, createLogger, type LogLevel } from './lib/logger';
