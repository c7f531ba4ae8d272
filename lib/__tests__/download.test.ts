import { ensureDownloaded, isAffirmative, unavailableRetriever } from '../download';
import { InstallationMissingError, RetrieverUnavailableError } from '../errors';
import { IRetriever, RetrieverFactory } from '../interfaces';
import { createMockLogger, createMockPrompt, createTestConfig, MockLogger } from './helpers/mocks';

describe('download', () => {
    describe('isAffirmative', () => {
        it.each(['', 'y', 'Y', 'yes', 'YES', 'yep'])('should accept %p', (answer) => {
            expect(isAffirmative(answer)).toBe(true);
        });

        it.each(['n', 'no', 'N', ' y', 'ok'])('should decline %p', (answer) => {
            expect(isAffirmative(answer)).toBe(false);
        });

        it('should decline when input ended without an answer', () => {
            expect(isAffirmative(undefined)).toBe(false);
        });
    });

    describe('ensureDownloaded', () => {
        let mockLogger: MockLogger;
        let retriever: { downloadAndUnpack: jest.Mock<Promise<void>, [string]> };
        let retrieverFactory: jest.Mock<IRetriever, Parameters<RetrieverFactory>>;

        beforeEach(() => {
            mockLogger = createMockLogger();
            retriever = { downloadAndUnpack: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined) };
            retrieverFactory = jest.fn<IRetriever, Parameters<RetrieverFactory>>(() => retriever);
        });

        it('should ask before downloading', async () => {
            const prompt = createMockPrompt('');

            await ensureDownloaded('/opt/teamcity', createTestConfig(), { logger: mockLogger, prompt, retrieverFactory });

            expect(prompt.ask).toHaveBeenCalledWith('Download TeamCity 2021.1 to  /opt/teamcity?: Y:');
            expect(retriever.downloadAndUnpack).toHaveBeenCalledWith('/opt/teamcity');
        });

        it('should not ask in quiet mode', async () => {
            const prompt = createMockPrompt('n');

            await ensureDownloaded('/opt/teamcity', createTestConfig({ downloadQuietly: true }), {
                logger: mockLogger,
                prompt,
                retrieverFactory,
            });

            expect(prompt.ask).not.toHaveBeenCalled();
            expect(retrieverFactory).toHaveBeenCalledTimes(1);
        });

        it('should throw InstallationMissingError when declined', async () => {
            const prompt = createMockPrompt('no');

            const promise = ensureDownloaded('/opt/teamcity', createTestConfig(), { logger: mockLogger, prompt, retrieverFactory });

            await expect(promise).rejects.toBeInstanceOf(InstallationMissingError);
            await expect(promise).rejects.toThrow('TeamCity distribution not found.');
            expect(retrieverFactory).not.toHaveBeenCalled();
        });

        it('should route retriever messages to info or debug', async () => {
            retrieverFactory.mockImplementation((_url, _version, log) => ({
                async downloadAndUnpack(): Promise<void> {
                    log('Downloading TeamCity 2021.1', false);
                    log('Received 1024 bytes', true);
                },
            }));

            await ensureDownloaded('/opt/teamcity', createTestConfig({ downloadQuietly: true }), {
                logger: mockLogger,
                retrieverFactory,
            });

            expect(mockLogger.info).toHaveBeenCalledWith('Downloading TeamCity 2021.1');
            expect(mockLogger.debug).toHaveBeenCalledWith('Received 1024 bytes');
            expect(mockLogger.info).not.toHaveBeenCalledWith('Received 1024 bytes');
        });

        it('should fall back to a retriever that reports where to download from', async () => {
            const promise = ensureDownloaded('/opt/teamcity', createTestConfig({ downloadQuietly: true }), { logger: mockLogger });

            await expect(promise).rejects.toBeInstanceOf(RetrieverUnavailableError);
            await expect(promise).rejects.toThrow(
                'No retriever is configured. Download TeamCity 2021.1 from http://download.example.com/teamcity '
                + 'and unpack it into [/opt/teamcity].',
            );
        });
    });

    describe('unavailableRetriever', () => {
        it('should reject with RETRIEVER_UNAVAILABLE', async () => {
            const retriever = unavailableRetriever('http://download.example.com/teamcity', '2020.2', () => undefined);

            await expect(retriever.downloadAndUnpack('/srv/tc')).rejects.toMatchObject({ code: 'RETRIEVER_UNAVAILABLE' });
        });
    });
});
