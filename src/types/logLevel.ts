export type LogLevel = 'spam' | 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = ['spam', 'debug', 'info', 'warn', 'error', 'none'];
