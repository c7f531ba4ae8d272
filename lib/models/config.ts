/**
 * Settings of a single invocation. Built once by the caller and never mutated.
 */
export type Configuration = {
    /** Location of the TeamCity distribution */
    readonly teamcityDir: string;

    /** Version the project is developed against, compared verbatim with the installed one */
    readonly teamcityVersion: string;

    /** Skip the confirmation prompt before a download */
    readonly downloadQuietly: boolean;

    /** Base URL distributions are fetched from */
    readonly teamcitySourceUrl: string;

    /** File name of the built plugin package */
    readonly pluginPackageName: string;

    /** Start the bundled build agent together with the server */
    readonly startAgent: boolean;

    /**
     * Location of the TeamCity data directory.
     * A relative path is resolved against teamcityDir.
     */
    readonly dataDirectory: string;

    /** Directory the build writes the plugin package to */
    readonly buildDirectory: string;
}

/**
 * Values a caller may supply; everything except the version has a default.
 */
export type ConfigurationInput = Partial<Configuration> & {
    teamcityVersion: string;
    artifactId?: string;
}
