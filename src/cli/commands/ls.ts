import { Command } from 'commander';
import { isDirectoryNode } from '../../vfs/types.js';
import { openFilesystem, type GlobalOptions } from '../utils/context.js';
import { formatError, formatListing } from '../utils/output.js';

export const lsCommand = new Command('ls')
    .description('List the matches of a search expression')
    .argument('<expression>', 'Search expression')
    .option('-j, --json', 'Output as JSON')
    .action(async (expression: string, options: { json?: boolean }, command: Command) => {
        const { root } = openFilesystem(command.optsWithGlobals<GlobalOptions>());

        const node = await root.lookup(expression);
        if (!isDirectoryNode(node)) {
            console.error(formatError(`${expression} is not a search expression`));
            process.exit(1);
        }

        const entries = await node.readDirAll();
        console.log(formatListing(expression, entries, options.json ?? false));
    });
