import * as path from 'path';
import { InstallationMissingError, RetrieverUnavailableError } from './errors';
import { ILogger } from './interfaces/logger-interface';
import { IPrompt, ReadlinePrompt } from './interfaces/prompt-interface';
import { RetrieverFactory } from './interfaces/retriever-interface';
import { toLogCallback } from './logger';
import { Configuration } from './models';

/**
 * Collaborators used when an installation has to be fetched
 */
export type DownloadDependencies = {
    logger: ILogger;
    prompt?: IPrompt;
    retrieverFactory?: RetrieverFactory;
}

/**
 * Retriever used when the embedding application supplies none.
 * Fails with the location the distribution can be fetched from manually.
 */
export const unavailableRetriever: RetrieverFactory = (sourceUrl, version) => ({
    async downloadAndUnpack(targetDir: string): Promise<void> {
        throw new RetrieverUnavailableError(
            `No retriever is configured. Download TeamCity ${version} from ${sourceUrl} `
            + `and unpack it into [${path.resolve(targetDir)}].`,
        );
    },
});

/**
 * Empty input or anything starting with y/Y accepts
 */
export function isAffirmative(answer: string | undefined): boolean {
    if (answer === undefined) {
        return false;
    }
    return answer.length === 0 || answer.charAt(0).toLowerCase() === 'y';
}

async function askToDownload(teamcityDir: string, config: Configuration, prompt: IPrompt): Promise<boolean> {
    const answer = await prompt.ask(`Download TeamCity ${config.teamcityVersion} to  ${path.resolve(teamcityDir)}?: Y:`);
    return isAffirmative(answer);
}

/**
 * Fetches a fresh distribution into `teamcityDir`, asking first unless configured to download quietly
 */
export async function ensureDownloaded(
    teamcityDir: string,
    config: Configuration,
    deps: DownloadDependencies,
): Promise<void> {
    const { logger } = deps;
    const prompt = deps.prompt || new ReadlinePrompt();
    const createRetriever = deps.retrieverFactory || unavailableRetriever;

    if (!config.downloadQuietly && !(await askToDownload(teamcityDir, config, prompt))) {
        throw new InstallationMissingError();
    }

    const retriever = createRetriever(config.teamcitySourceUrl, config.teamcityVersion, toLogCallback(logger));
    await retriever.downloadAndUnpack(teamcityDir);
}
