import { spawn, SpawnOptions } from 'child_process';
import { Readable } from 'stream';

/**
 * The parts of a spawned child the runner relies on
 */
export interface ISpawnedProcess {
    readonly stdout: Readable | null;
    once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
    once(event: 'error', listener: (error: NodeJS.ErrnoException) => void): this;
}

/**
 * Process execution abstraction interface for testability
 */
export interface IProcessExecutor {
    spawn(command: string, args: string[], options: SpawnOptions): ISpawnedProcess;
}

/**
 * Default implementation using Node.js child_process
 */
export class NodeProcessExecutor implements IProcessExecutor {
    spawn(command: string, args: string[], options: SpawnOptions): ISpawnedProcess {
        return spawn(command, args, options);
    }
}
