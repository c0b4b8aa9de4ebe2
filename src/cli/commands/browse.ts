import { Command } from 'commander';
import * as readline from 'readline';
import { BrowseSession } from '../utils/BrowseSession.js';
import { openFilesystem, type GlobalOptions } from '../utils/context.js';

export const browseCommand = new Command('browse')
    .description('Navigate search results interactively')
    .action(async (_options: unknown, command: Command) => {
        const { root } = openFilesystem(command.optsWithGlobals<GlobalOptions>());
        const session = new BrowseSession(root);

        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
            prompt: session.prompt()
        });

        console.log('Type "help" for commands.');
        rl.prompt();
        for await (const line of rl) {
            const result = await session.execute(line);
            if (result.output) {
                console.log(result.output);
            }
            if (result.exit) {
                break;
            }
            rl.setPrompt(session.prompt());
            rl.prompt();
        }
        rl.close();
    });
