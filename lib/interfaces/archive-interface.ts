import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import extractZip from 'extract-zip';

/**
 * Zip/jar access abstraction interface for testability
 */
export interface IArchiveReader {
    /**
     * Reads one entry of an archive.
     * Resolves with undefined when the archive has no such entry.
     */
    readEntry(archivePath: string, entryName: string): Promise<Buffer | undefined>;
}

/**
 * Default implementation: unpacks into a scratch directory with extract-zip
 */
export class ExtractZipArchiveReader implements IArchiveReader {
    async readEntry(archivePath: string, entryName: string): Promise<Buffer | undefined> {
        const scratchDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'teamcity-devkit-'));

        try {
            await extractZip(path.resolve(archivePath), { dir: scratchDir });

            const entryPath = path.join(scratchDir, entryName);
            if (!fs.existsSync(entryPath)) {
                return undefined;
            }
            return await fs.promises.readFile(entryPath);
        } finally {
            await fs.promises.rm(scratchDir, { recursive: true, force: true });
        }
    }
}
