export * from './archive-interface';
export * from './fs-interface';
export * from './logger-interface';
export * from './process-interface';
export * from './prompt-interface';
export * from './retriever-interface';
