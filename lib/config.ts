import * as path from 'path';
import {
    DEFAULT_BUILD_DIRECTORY,
    DEFAULT_DATA_DIRECTORY,
    DEFAULT_DOWNLOAD_QUIETLY,
    DEFAULT_SERVERS_DIR,
    DEFAULT_SOURCE_URL,
    DEFAULT_START_AGENT,
} from '../data/defaults';
import { InvalidArgumentsError } from './errors';
import { CliOptions, Configuration, ConfigurationInput } from './models';

/**
 * Fills defaults into caller-supplied settings.
 * The returned object is frozen for the rest of the invocation.
 */
export function createConfig(input: ConfigurationInput, cwd: string = process.cwd()): Configuration {
    const { teamcityVersion } = input;
    if (!teamcityVersion) {
        throw new InvalidArgumentsError('TeamCity version is required');
    }

    const artifactId = input.artifactId ?? path.basename(cwd);

    return Object.freeze({
        teamcityDir: input.teamcityDir ?? path.join(DEFAULT_SERVERS_DIR, teamcityVersion),
        teamcityVersion,
        downloadQuietly: input.downloadQuietly ?? DEFAULT_DOWNLOAD_QUIETLY,
        teamcitySourceUrl: input.teamcitySourceUrl ?? DEFAULT_SOURCE_URL,
        pluginPackageName: input.pluginPackageName ?? `${artifactId}.zip`,
        startAgent: input.startAgent ?? DEFAULT_START_AGENT,
        dataDirectory: input.dataDirectory ?? DEFAULT_DATA_DIRECTORY,
        buildDirectory: input.buildDirectory ?? DEFAULT_BUILD_DIRECTORY,
    });
}

/**
 * Maps command line options onto configuration input
 */
export function configFromOptions(options: CliOptions, cwd: string = process.cwd()): Configuration {
    if (!options.version) {
        throw new InvalidArgumentsError('Missing required option --version');
    }

    return createConfig({
        teamcityVersion: options.version,
        teamcityDir: options.dir,
        downloadQuietly: options.quiet,
        teamcitySourceUrl: options.sourceUrl,
        pluginPackageName: options.packageName,
        artifactId: options.artifactId,
        startAgent: options.noAgent ? false : undefined,
        dataDirectory: options.dataDir,
        buildDirectory: options.buildDir,
    }, cwd);
}
