export * from './logger';
export * from './errors';
export * from './network';
export * from './timestamp';
export * from './version';
export * from './startup-banner';
