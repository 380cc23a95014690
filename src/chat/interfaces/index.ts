export * from './conversation-session.interface';
