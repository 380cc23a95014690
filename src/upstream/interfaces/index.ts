export * from './upstream.interface';
