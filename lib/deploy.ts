import * as path from 'path';
import { PLUGINS_DIR } from '../data/defaults';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { ILogger } from './interfaces/logger-interface';
import { Configuration } from './models';

/**
 * Absolute data directory: `dataDirectory` itself when absolute,
 * otherwise resolved against the installation directory
 */
export function resolveDataDirectory(config: Configuration): string {
    if (path.isAbsolute(config.dataDirectory)) {
        return path.resolve(config.dataDirectory);
    }
    return path.resolve(config.teamcityDir, config.dataDirectory);
}

/**
 * Copies the built plugin package into `<data dir>/plugins`.
 * A missing package is reported and skipped; the data directory is returned either way.
 */
export function deployPlugin(
    config: Configuration,
    logger: ILogger,
    fileSystem?: IFileSystem,
): string {
    const fs = fileSystem || new NodeFileSystem();
    const effectiveDataDir = resolveDataDirectory(config);
    const packageFile = path.resolve(config.buildDirectory, config.pluginPackageName);

    if (!fs.existsSync(packageFile)) {
        logger.warn(
            `Target file [${packageFile}] does not exist. Nothing will be deployed. Did you forget 'package' goal?`,
        );
        return effectiveDataDir;
    }

    const target = path.join(effectiveDataDir, PLUGINS_DIR, config.pluginPackageName);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(packageFile, target);
    logger.info(`Deployed [${packageFile}] to [${target}]`);

    return effectiveDataDir;
}
