import * as path from 'path';
import { MARKER_SCRIPT } from '../data/defaults';
import { ensureDownloaded, DownloadDependencies } from './download';
import { IArchiveReader } from './interfaces/archive-interface';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { ILogger } from './interfaces/logger-interface';
import { Configuration, InstallationState } from './models';
import { readVersion } from './version';

/**
 * Collaborators used while checking an installation
 */
export type InstallationDependencies = DownloadDependencies & {
    logger: ILogger;
    fileSystem?: IFileSystem;
    archiveReader?: IArchiveReader;
}

/**
 * A directory looks like a TeamCity installation when it has the POSIX
 * all-in-one launcher. The same file is probed on Windows hosts.
 */
export function looksLikeTeamCityDir(teamcityDir: string, fileSystem?: IFileSystem): boolean {
    const fs = fileSystem || new NodeFileSystem();
    return fs.existsSync(path.join(teamcityDir, MARKER_SCRIPT));
}

type Inspection = {
    state: InstallationState;
    installedVersion?: string;
}

async function inspectInstallation(
    teamcityDir: string,
    expectedVersion: string,
    fileSystem?: IFileSystem,
    archiveReader?: IArchiveReader,
): Promise<Inspection> {
    const fs = fileSystem || new NodeFileSystem();

    if (!fs.existsSync(teamcityDir) || !looksLikeTeamCityDir(teamcityDir, fs)) {
        return { state: InstallationState.BAD };
    }

    const installedVersion = await readVersion(teamcityDir, fs, archiveReader);
    if (installedVersion !== expectedVersion) {
        return { state: InstallationState.MISVERSION, installedVersion };
    }

    return { state: InstallationState.GOOD, installedVersion };
}

/**
 * Classifies an installation directory.
 * Failure to read the version of a directory that looks like an installation is an error, not BAD.
 */
export async function evaluateInstallation(
    teamcityDir: string,
    expectedVersion: string,
    fileSystem?: IFileSystem,
    archiveReader?: IArchiveReader,
): Promise<InstallationState> {
    const { state } = await inspectInstallation(teamcityDir, expectedVersion, fileSystem, archiveReader);
    return state;
}

/**
 * Makes sure a usable installation exists before a task runs.
 * A wrong version only produces a warning; a missing one is downloaded or the call fails.
 */
export async function ensureInstallationReady(
    config: Configuration,
    deps: InstallationDependencies,
): Promise<InstallationState> {
    const { logger, fileSystem, archiveReader } = deps;
    const dir = config.teamcityDir;
    const absoluteDir = path.resolve(dir);

    const { state, installedVersion } = await inspectInstallation(
        dir,
        config.teamcityVersion,
        fileSystem,
        archiveReader,
    );

    switch (state) {
        case InstallationState.GOOD:
            logger.info(`TeamCity ${config.teamcityVersion} is located at ${dir}`);
            break;
        case InstallationState.MISVERSION:
            logger.warn(
                `TeamCity version at [${absoluteDir}] is [${installedVersion}], but project uses [${config.teamcityVersion}]`,
            );
            break;
        case InstallationState.BAD:
            logger.info(`TeamCity distribution not found at [${absoluteDir}]`);
            await ensureDownloaded(dir, config, deps);
            break;
    }

    return state;
}
