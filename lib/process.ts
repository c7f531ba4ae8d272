import * as readline from 'readline';
import { Readable } from 'stream';
import { AGENT_LAUNCHER, DRAIN_GRACE_MS, SERVER_LAUNCHER } from '../data/defaults';
import { ProcessLaunchError } from './errors';
import { ILogger } from './interfaces/logger-interface';
import { IProcessExecutor, NodeProcessExecutor } from './interfaces/process-interface';
import { RunCommand, RunOptions } from './models';

/**
 * Forwards a stream line by line until it closes or is stopped.
 * `stop()` resolves only once the last line has been delivered.
 */
export class OutputDrain {
    private readonly stream: Readable;
    private readonly onLine: (line: string) => void;
    private readonly onError: (error: Error) => void;
    private rl: readline.Interface | null = null;
    private closed: Promise<void> = Promise.resolve();
    private isClosed = false;

    constructor(stream: Readable, onLine: (line: string) => void, onError: (error: Error) => void) {
        this.stream = stream;
        this.onLine = onLine;
        this.onError = onError;
    }

    start(): this {
        const rl = readline.createInterface({ input: this.stream, crlfDelay: Infinity });
        this.rl = rl;
        this.closed = new Promise((resolve) => {
            rl.on('close', () => {
                this.isClosed = true;
                resolve();
            });
        });
        rl.on('line', (line: string) => this.onLine(line));

        // a read error ends the drain; readline re-emits the stream's error, report it once
        const fail = (error: Error): void => {
            if (this.isClosed) {
                return;
            }
            this.onError(error);
            rl.close();
        };
        rl.on('error', fail);
        this.stream.on('error', fail);
        return this;
    }

    /**
     * Waits up to `graceMs` for the stream to end by itself, then closes it.
     * A background child that inherited the pipe can keep it open after the launcher exits.
     */
    async stop(graceMs: number = DRAIN_GRACE_MS): Promise<void> {
        const rl = this.rl;
        if (!rl) {
            return;
        }

        let timer: NodeJS.Timeout | undefined;
        const grace = new Promise<void>((resolve) => {
            timer = setTimeout(resolve, graceMs);
        });

        await Promise.race([this.closed, grace]);
        clearTimeout(timer);

        if (!this.isClosed) {
            rl.close();
            this.stream.destroy();
        }
        await this.closed;
        this.rl = null;
    }
}

/**
 * Builds the launcher command line for the host platform.
 * Scripts are addressed relative to the installation directory.
 */
export function createRunCommand(
    startAgent: boolean,
    params: string[],
    platform: NodeJS.Platform = process.platform,
): RunCommand {
    const fileName = startAgent ? AGENT_LAUNCHER : SERVER_LAUNCHER;

    if (platform === 'win32') {
        return { command: 'cmd', args: ['/C', `bin\\${fileName}`, ...params] };
    }
    return { command: '/bin/bash', args: [`bin/${fileName}.sh`, ...params] };
}

function describeLaunchError(error: NodeJS.ErrnoException, command: RunCommand, cwd: string): string {
    const commandLine = [command.command, ...command.args].join(' ');
    if (error.code === 'ENOENT') {
        return `Cannot start [${commandLine}] in [${cwd}]: executable or working directory not found.`;
    }
    if (error.code === 'EACCES') {
        return `Cannot start [${commandLine}] in [${cwd}]: permission denied. (Original error: ${error.message})`;
    }
    return `Cannot start [${commandLine}] in [${cwd}]: ${error.message}`;
}

/**
 * Runs a TeamCity launcher script and forwards its standard output to the logger.
 * Resolves with the exit code once every line has been logged; non-zero codes are not errors here.
 */
export async function runTeamCity(
    teamcityDir: string,
    startAgent: boolean,
    extraArgs: string[],
    logger: ILogger,
    options: RunOptions = {},
    processExecutor?: IProcessExecutor,
): Promise<number> {
    const { env, platform, drainGraceMs = DRAIN_GRACE_MS } = options;
    const executor = processExecutor || new NodeProcessExecutor();
    const runCommand = createRunCommand(startAgent, extraArgs, platform);

    logger.debug(`Running [${[runCommand.command, ...runCommand.args].join(' ')}] in [${teamcityDir}]`);

    const child = executor.spawn(runCommand.command, runCommand.args, {
        cwd: teamcityDir,
        env: env ? { ...process.env, ...env } : undefined,
        stdio: ['ignore', 'pipe', 'inherit'],
        shell: false,
    });

    const drain = child.stdout
        ? new OutputDrain(
            child.stdout,
            (line) => logger.info(line),
            (error) => logger.warn(`Failed to read process output: ${error.message}`),
        ).start()
        : null;

    try {
        return await new Promise<number>((resolve, reject) => {
            child.once('error', (error: NodeJS.ErrnoException) => {
                reject(new ProcessLaunchError(describeLaunchError(error, runCommand, teamcityDir), runCommand.command));
            });
            child.once('exit', (code: number | null) => {
                resolve(code ?? -1);
            });
        });
    } finally {
        await drain?.stop(drainGraceMs);
    }
}
