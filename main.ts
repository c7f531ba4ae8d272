#!/usr/bin/env node
import { parseArgs } from './lib/cli';
import { executeCommand } from './lib/command-router';

async function main(): Promise<void> {
    try {
        const { command, options } = parseArgs(process.argv.slice(2));
        process.exitCode = await executeCommand(command, options);
    } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
}

void main();
