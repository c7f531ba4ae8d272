import { checkInstallation, reloadPlugin, startServer, stopServer, TaskDependencies } from './commands';
import { configFromOptions } from './config';
import { InvalidArgumentsError } from './errors';
import { ILogger } from './interfaces/logger-interface';
import { ConsoleLogger } from './logger';
import { CliOptions } from './models';

/**
 * Builds the task dependencies for a run; tests and embedders override parts of it
 */
export type DependencyFactory = (logger: ILogger) => TaskDependencies;

const defaultDependencies: DependencyFactory = (logger) => ({ logger });

/**
 * Executes a command and resolves with the process exit code
 */
export async function executeCommand(
    command: string,
    options: CliOptions,
    createDependencies: DependencyFactory = defaultDependencies,
    cwd: string = process.cwd(),
): Promise<number> {
    if (options.help || command === 'help' || command === '') {
        printHelp();
        return 0;
    }

    const logger = new ConsoleLogger(options.verbose ?? false);
    const deps = createDependencies(logger);

    switch (command) {
        case 'check': {
            const config = configFromOptions(options, cwd);
            await checkInstallation(config, deps);
            return 0;
        }

        case 'start': {
            const config = configFromOptions(options, cwd);
            return startServer(config, deps);
        }

        case 'stop': {
            const config = configFromOptions(options, cwd);
            return stopServer(config, deps);
        }

        case 'reload': {
            const config = configFromOptions(options, cwd);
            const dataDirectory = await reloadPlugin(config, deps);
            logger.info(`Data directory: ${dataDirectory}`);
            return 0;
        }

        default:
            throw new InvalidArgumentsError(`Unknown command: ${command}. Type "help" for usage information.`);
    }
}

/**
 * Prints general help information
 */
export function printHelp(): void {
    console.log(`
Usage: teamcity-devkit <command> --version <version> [options]

Commands:
  check                  Verify the TeamCity installation, downloading it if missing
  start                  Deploy the plugin and start the server (and agent)
  stop                   Stop the server (and agent)
  reload                 Deploy the plugin into the data directory
  help                   Show this help message

Options:
  --version <version>    TeamCity version the plugin is built against (required)
  --dir <path>           TeamCity installation directory (default: servers/<version>)
  -q, --quiet            Download without asking for confirmation
  --source-url <url>     Download location of TeamCity distributions
  --package <file>       Plugin package file name (default: <artifact-id>.zip)
  --artifact-id <id>     Artifact id used for the default package name (default: current directory name)
  --no-agent             Start the server without the bundled build agent
  --data-dir <path>      Data directory, relative paths resolve against the installation (default: .datadir)
  --build-dir <path>     Directory holding the built package (default: target)
  -v, --verbose          Print debug output
  -h, --help             Show this help message
`);
}
