import { Command } from 'commander';
import { isDirectoryNode } from '../../vfs/types.js';
import { blobRefOf } from '../utils/BrowseSession.js';
import { openFilesystem, type GlobalOptions } from '../utils/context.js';
import { formatAttr, formatError } from '../utils/output.js';

export const statCommand = new Command('stat')
    .description('Show the attributes of one match of a search expression')
    .argument('<expression>', 'Search expression')
    .argument('<name>', 'Entry name as shown by ls')
    .option('-j, --json', 'Output as JSON')
    .action(async (expression: string, name: string, options: { json?: boolean }, command: Command) => {
        const { root } = openFilesystem(command.optsWithGlobals<GlobalOptions>());

        const dir = await root.lookup(expression);
        if (!isDirectoryNode(dir)) {
            console.error(formatError(`${expression} is not a search expression`));
            process.exit(1);
        }

        const node = await dir.lookup(name);
        console.log(formatAttr(name, node.attr(), blobRefOf(node), options.json ?? false));
    });
