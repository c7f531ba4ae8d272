import * as path from 'path';
import { configFromOptions, createConfig } from '../config';
import { InvalidArgumentsError } from '../errors';

describe('config', () => {
    describe('createConfig', () => {
        it('should fill in defaults', () => {
            const config = createConfig({ teamcityVersion: '2021.1' }, '/work/my-plugin');

            expect(config).toEqual({
                teamcityDir: path.join('servers', '2021.1'),
                teamcityVersion: '2021.1',
                downloadQuietly: false,
                teamcitySourceUrl: 'http://download.jetbrains.com/teamcity',
                pluginPackageName: 'my-plugin.zip',
                startAgent: true,
                dataDirectory: '.datadir',
                buildDirectory: 'target',
            });
        });

        it('should derive the package name from the artifact id', () => {
            const config = createConfig({ teamcityVersion: '2021.1', artifactId: 'build-stats' }, '/work/my-plugin');

            expect(config.pluginPackageName).toBe('build-stats.zip');
        });

        it('should keep supplied values', () => {
            const config = createConfig({
                teamcityVersion: '2020.2',
                teamcityDir: '/opt/tc',
                downloadQuietly: true,
                startAgent: false,
                pluginPackageName: 'custom.zip',
            }, '/work/my-plugin');

            expect(config.teamcityDir).toBe('/opt/tc');
            expect(config.downloadQuietly).toBe(true);
            expect(config.startAgent).toBe(false);
            expect(config.pluginPackageName).toBe('custom.zip');
        });

        it('should return a frozen configuration', () => {
            expect(Object.isFrozen(createConfig({ teamcityVersion: '2021.1' }))).toBe(true);
        });

        it('should require a version', () => {
            expect(() => createConfig({ teamcityVersion: '' })).toThrow(InvalidArgumentsError);
        });
    });

    describe('configFromOptions', () => {
        it('should map command line options', () => {
            const config = configFromOptions({
                version: '2021.1',
                dir: '/opt/tc',
                quiet: true,
                noAgent: true,
                dataDir: '/data',
                buildDir: 'build',
                sourceUrl: 'http://mirror.example.com/tc',
            }, '/work/my-plugin');

            expect(config).toEqual({
                teamcityDir: '/opt/tc',
                teamcityVersion: '2021.1',
                downloadQuietly: true,
                teamcitySourceUrl: 'http://mirror.example.com/tc',
                pluginPackageName: 'my-plugin.zip',
                startAgent: false,
                dataDirectory: '/data',
                buildDirectory: 'build',
            });
        });

        it('should require --version', () => {
            expect(() => configFromOptions({ dir: '/opt/tc' })).toThrow('Missing required option --version');
        });
    });
});
