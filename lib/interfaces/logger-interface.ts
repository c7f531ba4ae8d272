/**
 * Logging capability passed to every component that reports progress
 */
export interface ILogger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    debug(message: string): void;
}
