import { executeCommand, DependencyFactory } from '../command-router';
import { InvalidArgumentsError } from '../errors';
import {
    createMockArchiveReader,
    createMockFileSystem,
    createMockPrompt,
    MockFileSystem,
    versionProperties,
} from './helpers/mocks';

describe('command-router', () => {
    let logSpy: jest.SpyInstance;
    let mockFileSystem: MockFileSystem;
    let createDependencies: DependencyFactory;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        mockFileSystem = createMockFileSystem();
        mockFileSystem.existsSync.mockReturnValue(true);
        mockFileSystem.isFile.mockReturnValue(true);
        const mockArchiveReader = createMockArchiveReader();
        mockArchiveReader.readEntry.mockResolvedValue(versionProperties('2021.1'));

        createDependencies = (logger) => ({
            logger,
            fileSystem: mockFileSystem,
            archiveReader: mockArchiveReader,
            prompt: createMockPrompt('n'),
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should print help for the help command', async () => {
        await expect(executeCommand('help', {}, createDependencies)).resolves.toBe(0);
        expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Usage: teamcity-devkit <command>'));
    });

    it('should print help when no command is given', async () => {
        await expect(executeCommand('', {}, createDependencies)).resolves.toBe(0);
        expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('should print help for --help on any command', async () => {
        await expect(executeCommand('start', { help: true }, createDependencies)).resolves.toBe(0);
        expect(mockFileSystem.existsSync).not.toHaveBeenCalled();
    });

    it('should check the installation', async () => {
        await expect(executeCommand('check', { version: '2021.1', dir: '/opt/teamcity' }, createDependencies))
            .resolves.toBe(0);
        expect(logSpy).toHaveBeenCalledWith('[INFO] TeamCity 2021.1 is located at /opt/teamcity');
    });

    it('should reload the plugin and log the data directory', async () => {
        await expect(executeCommand(
            'reload',
            { version: '2021.1', dir: '/opt/teamcity', buildDir: '/work/target', artifactId: 'my-plugin' },
            createDependencies,
        )).resolves.toBe(0);

        expect(mockFileSystem.copyFileSync).toHaveBeenCalledWith(
            '/work/target/my-plugin.zip',
            '/opt/teamcity/.datadir/plugins/my-plugin.zip',
        );
        expect(logSpy).toHaveBeenCalledWith('[INFO] Data directory: /opt/teamcity/.datadir');
    });

    it('should require a version for task commands', async () => {
        await expect(executeCommand('check', {}, createDependencies)).rejects.toThrow('Missing required option --version');
    });

    it('should reject unknown commands', async () => {
        await expect(executeCommand('deploy', { version: '2021.1' }, createDependencies))
            .rejects.toBeInstanceOf(InvalidArgumentsError);
    });
});
