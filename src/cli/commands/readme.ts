import { Command } from 'commander';
import { SEARCH_README } from '../../vfs/QueryDirectory.js';

export const readmeCommand = new Command('readme')
    .description('Print the README shown at the root of the search mount')
    .action(() => {
        console.log(SEARCH_README.trim());
    });
