export * from './auth-middleware';
export * from './cors';
export * from './request-logger';
export * from './validation';
