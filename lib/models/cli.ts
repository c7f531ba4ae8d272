export type CommandName = 'check' | 'start' | 'stop' | 'reload' | 'help';

/**
 * Options recognised on the command line
 */
export type CliOptions = {
    version?: string;
    dir?: string;
    quiet?: boolean;
    sourceUrl?: string;
    packageName?: string;
    artifactId?: string;
    noAgent?: boolean;
    dataDir?: string;
    buildDir?: string;
    verbose?: boolean;
    help?: boolean;
}

/**
 * Result of parsing argv
 */
export type ParsedArgs = {
    command: string;
    options: CliOptions;
    positionals: string[];
}
