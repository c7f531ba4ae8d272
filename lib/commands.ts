import { DATA_PATH_ENV } from '../data/defaults';
import { deployPlugin } from './deploy';
import { ensureInstallationReady, InstallationDependencies } from './installation';
import { IProcessExecutor } from './interfaces/process-interface';
import { Configuration, InstallationState, RunOptions } from './models';
import { runTeamCity } from './process';

/**
 * Everything a task needs; only the logger is mandatory
 */
export type TaskDependencies = InstallationDependencies & {
    processExecutor?: IProcessExecutor;
    runOptions?: Omit<RunOptions, 'env'>;
}

/**
 * Verifies the installation, downloading it when missing
 */
export async function checkInstallation(
    config: Configuration,
    deps: TaskDependencies,
): Promise<InstallationState> {
    return ensureInstallationReady(config, deps);
}

/**
 * Deploys the plugin and starts the server (and agent, unless disabled) against the data directory
 */
export async function startServer(
    config: Configuration,
    deps: TaskDependencies,
): Promise<number> {
    await ensureInstallationReady(config, deps);
    const dataDirectory = deployPlugin(config, deps.logger, deps.fileSystem);

    deps.logger.info(`Starting TeamCity with data directory [${dataDirectory}]`);
    return runTeamCity(
        config.teamcityDir,
        config.startAgent,
        ['start'],
        deps.logger,
        { ...deps.runOptions, env: { [DATA_PATH_ENV]: dataDirectory } },
        deps.processExecutor,
    );
}

/**
 * Stops a server (and agent) started by {@link startServer}
 */
export async function stopServer(
    config: Configuration,
    deps: TaskDependencies,
): Promise<number> {
    await ensureInstallationReady(config, deps);

    deps.logger.info('Stopping TeamCity');
    return runTeamCity(
        config.teamcityDir,
        config.startAgent,
        ['stop'],
        deps.logger,
        { ...deps.runOptions },
        deps.processExecutor,
    );
}

/**
 * Copies a rebuilt plugin into a running server's data directory
 */
export async function reloadPlugin(
    config: Configuration,
    deps: TaskDependencies,
): Promise<string> {
    await ensureInstallationReady(config, deps);
    return deployPlugin(config, deps.logger, deps.fileSystem);
}
