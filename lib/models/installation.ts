export enum InstallationState {
    GOOD = 'GOOD',
    MISVERSION = 'MISVERSION',
    BAD = 'BAD',
}
