import { InvalidArgumentsError } from './errors';
import { CliOptions, ParsedArgs } from './models';

export type { CliOptions, ParsedArgs };

type ValueOption = 'version' | 'dir' | 'sourceUrl' | 'packageName' | 'artifactId' | 'dataDir' | 'buildDir';
type FlagOption = 'quiet' | 'noAgent' | 'verbose' | 'help';

const VALUE_OPTIONS: Record<string, ValueOption> = {
    '--version': 'version',
    '--dir': 'dir',
    '--source-url': 'sourceUrl',
    '--package': 'packageName',
    '--artifact-id': 'artifactId',
    '--data-dir': 'dataDir',
    '--build-dir': 'buildDir',
};

const FLAG_OPTIONS: Record<string, FlagOption> = {
    '--quiet': 'quiet',
    '-q': 'quiet',
    '--no-agent': 'noAgent',
    '--verbose': 'verbose',
    '-v': 'verbose',
    '--help': 'help',
    '-h': 'help',
};

/**
 * Splits command line arguments into a command, options and remaining positionals.
 * Value options take the next argument or an inline `--name=value`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
    const options: CliOptions = {};
    const positionals: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (!arg.startsWith('-') || arg === '-') {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq > 0 ? arg.slice(0, eq) : arg;

        const flag = FLAG_OPTIONS[name];
        if (flag) {
            if (eq > 0) {
                throw new InvalidArgumentsError(`Option ${name} does not take a value`);
            }
            options[flag] = true;
            continue;
        }

        const key = VALUE_OPTIONS[name];
        if (!key) {
            throw new InvalidArgumentsError(`Unknown option: ${name}`);
        }

        let value: string | undefined;
        if (eq > 0) {
            value = arg.slice(eq + 1);
        } else {
            value = argv[i + 1];
            i++;
        }
        if (value === undefined || value === '' || (eq < 0 && value.startsWith('--'))) {
            throw new InvalidArgumentsError(`Option ${name} requires a value`);
        }
        options[key] = value;
    }

    const command = positionals[0] || '';
    return { command, options, positionals: positionals.slice(1) };
}
