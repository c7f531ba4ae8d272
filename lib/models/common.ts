/**
 * Logging callback handed to the retriever.
 * `debug` routes the message to the verbose channel.
 */
export type LogCallback = (message: string, debug: boolean) => void;

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';
