export { lsCommand } from './ls.js';
export { statCommand } from './stat.js';
export { readmeCommand } from './readme.js';
export { browseCommand } from './browse.js';
