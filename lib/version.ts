import * as path from 'path';
import { VERSION_ARCHIVE, VERSION_ENTRY, VERSION_PROPERTY } from '../data/defaults';
import { InstallationUnreadableError } from './errors';
import { IArchiveReader, ExtractZipArchiveReader } from './interfaces/archive-interface';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { parseXmlProperties } from './properties';

/**
 * Reads the display version of the TeamCity installation at `teamcityDir`
 * from the server version properties bundled in common-api.jar
 */
export async function readVersion(
    teamcityDir: string,
    fileSystem?: IFileSystem,
    archiveReader?: IArchiveReader,
): Promise<string> {
    const fs = fileSystem || new NodeFileSystem();
    const archives = archiveReader || new ExtractZipArchiveReader();

    const commonApiJar = path.resolve(teamcityDir, VERSION_ARCHIVE);

    if (!fs.existsSync(commonApiJar) || !fs.isFile(commonApiJar)) {
        throw new InstallationUnreadableError(
            `Can not read TeamCity version. Can not access [${commonApiJar}]. `
            + `Check that [${teamcityDir}] points to valid TeamCity installation`,
            commonApiJar,
        );
    }

    let entry: Buffer | undefined;
    try {
        entry = await archives.readEntry(commonApiJar, VERSION_ENTRY);
    } catch (error) {
        throw new InstallationUnreadableError(
            `Failed to open [${commonApiJar}]: ${error instanceof Error ? error.message : String(error)}. Please, verify your installation.`,
            commonApiJar,
        );
    }

    if (entry === undefined) {
        throw new InstallationUnreadableError(
            `Failed to read TeamCity's version from [${commonApiJar}]. Please, verify your installation.`,
            commonApiJar,
        );
    }

    let properties: Map<string, string>;
    try {
        properties = parseXmlProperties(entry.toString('utf8'));
    } catch (error) {
        throw new InstallationUnreadableError(
            `Failed to parse [${VERSION_ENTRY}] in [${commonApiJar}]: ${error instanceof Error ? error.message : String(error)}. Please, verify your installation.`,
            commonApiJar,
        );
    }

    const version = properties.get(VERSION_PROPERTY);
    if (version === undefined) {
        throw new InstallationUnreadableError(
            `Property [${VERSION_PROPERTY}] is missing from [${VERSION_ENTRY}] in [${commonApiJar}]. Please, verify your installation.`,
            commonApiJar,
        );
    }

    return version;
}
