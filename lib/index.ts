export * from './commands';
export * from './config';
export * from './deploy';
export * from './download';
export * from './errors';
export * from './installation';
export * from './interfaces';
export * from './logger';
export * from './models';
export * from './process';
export * from './properties';
export * from './version';
