import { loadConfig, mergeConfig } from '../../domain/model/Config.js';
import { createSearchFilesystem, type SearchFilesystem } from '../../application/SearchFilesystem.js';
import logger from '../../infrastructure/logger/index.js';

export type GlobalOptions = {
    url?: string;
    verbose?: boolean;
};

export function openFilesystem(globals: GlobalOptions): SearchFilesystem {
    if (globals.verbose) {
        logger.setLevel('debug');
    }
    const config = mergeConfig(loadConfig(), { backend: { url: globals.url } });
    return createSearchFilesystem(config);
}
