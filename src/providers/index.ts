export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { LOG_LEVELS } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { ConsoleLogProviderOptions } from './ConsoleLogProvider.js';
