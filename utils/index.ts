export * from './ILogger';
export * from './Mutex';
