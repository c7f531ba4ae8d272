/**
 * Command line for a launcher script, split the way spawn() takes it
 */
export type RunCommand = {
    command: string;
    args: string[];
}

/**
 * Options for running a TeamCity launcher
 */
export type RunOptions = {
    /** Variables added on top of the inherited environment */
    env?: Record<string, string>;
    /** Overrides the host platform check, mostly for tests */
    platform?: NodeJS.Platform;
    /** How long to keep draining output after exit */
    drainGraceMs?: number;
}
