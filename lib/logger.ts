import { ILogger } from './interfaces/logger-interface';
import { LogCallback, LogLevel } from './models';

function formatLog(level: LogLevel, message: string): string {
    return `[${level.toUpperCase()}] ${message}`;
}

/**
 * Logger writing to the console. Debug lines are only printed in verbose mode.
 */
export class ConsoleLogger implements ILogger {
    private readonly verbose: boolean;

    constructor(verbose = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        console.log(formatLog('info', message));
    }

    warn(message: string): void {
        console.warn(formatLog('warn', message));
    }

    error(message: string): void {
        console.error(formatLog('error', message));
    }

    debug(message: string): void {
        if (this.verbose) {
            console.log(formatLog('debug', message));
        }
    }
}

/**
 * Adapts a logger to the (message, debug) callback the retriever reports through
 */
export function toLogCallback(logger: ILogger): LogCallback {
    return (message, debug) => {
        if (debug) {
            logger.debug(message);
        } else {
            logger.info(message);
        }
    };
}
