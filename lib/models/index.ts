export * from './common';
export * from './config';
export * from './installation';
export * from './process';
export * from './cli';
