export * from './child-process';
export * from './log-buffer';
export * from './output-capture';
export * from './supervisor';
export * from './health-probe';
export * from './status-reporter';
