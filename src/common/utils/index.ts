export * from './delay.util';
export * from './mutex.util';
export * from './stream-parser.util';
export * from './truncate.util';
export * from './upstream-event.util';
