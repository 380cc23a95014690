export * from './models.constant';
