import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import logger from '../../infrastructure/logger/index.js';

export interface SearchfsConfig {
    backend: {
        url: string;
        authToken?: string;
        timeoutMs: number;
    };
    cache: {
        ttlMs: number;
    };
}

export const DEFAULT_CONFIG: SearchfsConfig = {
    backend: {
        url: 'http://localhost:3179',
        timeoutMs: 30000
    },
    cache: {
        ttlMs: 10000 // how long a search result listing is served before re-querying
    }
};

const userConfigSchema = z.object({
    backend: z.object({
        url: z.string().url().optional(),
        authToken: z.string().optional(),
        timeoutMs: z.number().int().positive().optional()
    }).optional(),
    cache: z.object({
        ttlMs: z.number().int().nonnegative().optional()
    }).optional()
});

export type UserConfig = z.infer<typeof userConfigSchema>;

export function getSearchfsDir(): string {
    return path.join(os.homedir(), '.searchfs');
}

export function getConfigPath(): string {
    return path.join(getSearchfsDir(), 'config.json');
}

export function loadConfig(configPath: string = getConfigPath()): SearchfsConfig {
    const config = applyEnvOverrides(readConfigFile(configPath));
    logger.debug(`Config loaded: backend=${config.backend.url}, ttl=${config.cache.ttlMs}ms`);
    return config;
}

export function mergeConfig(base: SearchfsConfig, override: UserConfig): SearchfsConfig {
    return {
        backend: {
            url: override.backend?.url ?? base.backend.url,
            authToken: override.backend?.authToken ?? base.backend.authToken,
            timeoutMs: override.backend?.timeoutMs ?? base.backend.timeoutMs
        },
        cache: {
            ttlMs: override.cache?.ttlMs ?? base.cache.ttlMs
        }
    };
}

function readConfigFile(configPath: string): SearchfsConfig {
    if (!fs.existsSync(configPath)) {
        return DEFAULT_CONFIG;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
        logger.warn(`Could not read config at ${configPath}, using defaults`, error);
        return DEFAULT_CONFIG;
    }

    const parsed = userConfigSchema.safeParse(raw);
    if (!parsed.success) {
        logger.warn(`Invalid config at ${configPath}, using defaults: ${parsed.error.message}`);
        return DEFAULT_CONFIG;
    }
    return mergeConfig(DEFAULT_CONFIG, parsed.data);
}

function applyEnvOverrides(config: SearchfsConfig): SearchfsConfig {
    const url = process.env['SEARCHFS_URL'];
    const authToken = process.env['SEARCHFS_TOKEN'];
    return mergeConfig(config, {
        backend: {
            url: url || undefined,
            authToken: authToken || undefined
        }
    });
}

