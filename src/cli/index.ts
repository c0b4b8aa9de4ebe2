#!/usr/bin/env node

import { Command } from 'commander';
import { browseCommand, lsCommand, readmeCommand, statCommand } from './commands/index.js';
import { FilesystemError } from '../vfs/errors.js';
import { formatError } from './utils/output.js';

function describeFailure(reason: unknown): string {
    if (reason instanceof FilesystemError) {
        return `${reason.message} (${reason.errno})`;
    }
    return reason instanceof Error ? reason.message : String(reason);
}

// Global error handler - show clean error message without stack trace
process.on('uncaughtException', (error) => {
    console.error(formatError(describeFailure(error)));
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    console.error(formatError(describeFailure(reason)));
    process.exit(1);
});

const program = new Command();

program
    .name('searchfs')
    .description('Browse content-store search results as a directory tree')
    .version('0.1.0')
    .option('-u, --url <url>', 'Search backend URL (overrides config)')
    .option('-v, --verbose', 'Log cache and search activity');

program.addCommand(lsCommand);
program.addCommand(statCommand);
program.addCommand(readmeCommand);
program.addCommand(browseCommand);

await program.parseAsync();
