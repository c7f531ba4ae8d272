export type ErrorCode =
    | 'INSTALLATION_UNREADABLE'
    | 'INSTALLATION_MISSING'
    | 'PROCESS_LAUNCH'
    | 'RETRIEVER_UNAVAILABLE'
    | 'INVALID_ARGUMENTS'
    | 'INVALID_PROPERTIES';

export class TeamCityDevkitError extends Error {
    public readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = 'TeamCityDevkitError';
        this.code = code;
    }
}

/**
 * Version metadata of an installation could not be read
 */
export class InstallationUnreadableError extends TeamCityDevkitError {
    /** File that was probed */
    public readonly path: string;

    constructor(message: string, path: string) {
        super('INSTALLATION_UNREADABLE', message);
        this.name = 'InstallationUnreadableError';
        this.path = path;
    }
}

/**
 * No installation is present and the user declined to download one
 */
export class InstallationMissingError extends TeamCityDevkitError {
    constructor(message = 'TeamCity distribution not found.') {
        super('INSTALLATION_MISSING', message);
        this.name = 'InstallationMissingError';
    }
}

export class ProcessLaunchError extends TeamCityDevkitError {
    public readonly command: string;

    constructor(message: string, command: string) {
        super('PROCESS_LAUNCH', message);
        this.name = 'ProcessLaunchError';
        this.command = command;
    }
}

export class RetrieverUnavailableError extends TeamCityDevkitError {
    constructor(message: string) {
        super('RETRIEVER_UNAVAILABLE', message);
        this.name = 'RetrieverUnavailableError';
    }
}

export class InvalidArgumentsError extends TeamCityDevkitError {
    constructor(message: string) {
        super('INVALID_ARGUMENTS', message);
        this.name = 'InvalidArgumentsError';
    }
}

/**
 * An XML properties document is not well-formed
 */
export class PropertiesParseError extends TeamCityDevkitError {
    constructor(message: string) {
        super('INVALID_PROPERTIES', message);
        this.name = 'PropertiesParseError';
    }
}
