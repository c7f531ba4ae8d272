import * as fs from 'fs';

/**
 * File system abstraction interface for testability
 */
export interface IFileSystem {
    existsSync(path: string): boolean;
    isFile(path: string): boolean;
    mkdirSync(path: string, options?: { recursive?: boolean }): void;
    copyFileSync(src: string, dest: string): void;
}

/**
 * Default implementation using Node.js fs module
 */
export class NodeFileSystem implements IFileSystem {
    existsSync(path: string): boolean {
        return fs.existsSync(path);
    }

    isFile(path: string): boolean {
        return fs.statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
    }

    mkdirSync(path: string, options?: { recursive?: boolean }): void {
        fs.mkdirSync(path, options);
    }

    copyFileSync(src: string, dest: string): void {
        fs.copyFileSync(src, dest);
    }
}
