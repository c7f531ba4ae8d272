import { LogCallback } from '../models';

/**
 * Fetches a TeamCity distribution and unpacks it into a directory.
 * Supplied by the embedding application.
 */
export interface IRetriever {
    downloadAndUnpack(targetDir: string): Promise<void>;
}

/**
 * Creates a retriever bound to a source URL and version
 */
export type RetrieverFactory = (sourceUrl: string, version: string, log: LogCallback) => IRetriever;
