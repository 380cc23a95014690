export * from './account.interface';
