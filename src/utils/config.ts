import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type AppConfig } from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

const ENDPOINT_KEYS = ['arxivApi', 'arxivPdf', 'osfApi', 'trove', 'openalexApi'] as const;
const TIMEOUT_KEYS = ['existenceCheck', 'request', 'download'] as const;

/**
 * Partial configuration as it may appear in a config file or CLI flags.
 */
export type ConfigOverrides = Partial<Omit<AppConfig, 'endpoints' | 'timeouts'>> & {
    endpoints?: Partial<AppConfig['endpoints']>;
    timeouts?: Partial<AppConfig['timeouts']>;
};

/**
 * Load configuration from preprint-bridge.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('preprint-bridge', {
        searchPlaces: ['preprint-bridge.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return toOverrides(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Keep only the recognized, well-typed keys of a parsed config file.
 */
export function toOverrides(raw: unknown): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (!isRecord(raw)) return overrides;

    const logLevel = typeof raw['logLevel'] === 'string' ? parseLogLevel(raw['logLevel']) : undefined;
    if (logLevel) overrides.logLevel = logLevel;
    if (typeof raw['jsonLogs'] === 'boolean') overrides.jsonLogs = raw['jsonLogs'];
    if (typeof raw['email'] === 'string') overrides.email = raw['email'];

    const endpoints = raw['endpoints'];
    if (isRecord(endpoints)) {
        const picked: Partial<AppConfig['endpoints']> = {};
        for (const key of ENDPOINT_KEYS) {
            const value = endpoints[key];
            if (typeof value === 'string') picked[key] = value;
        }
        overrides.endpoints = picked;
    }

    const timeouts = raw['timeouts'];
    if (isRecord(timeouts)) {
        const picked: Partial<AppConfig['timeouts']> = {};
        for (const key of TIMEOUT_KEYS) {
            const value = timeouts[key];
            if (typeof value === 'number' && value > 0) picked[key] = value;
        }
        overrides.timeouts = picked;
    }

    return overrides;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const email = env['PREPRINT_BRIDGE_EMAIL'];
    if (email) {
        overrides.email = email;
    }

    const logLevel = parseLogLevel(env['LOG_LEVEL']);
    if (logLevel) {
        overrides.logLevel = logLevel;
    }

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<AppConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Layer overrides over the defaults; later layers win.
 * Nested endpoint/timeout objects are merged key by key.
 */
export function mergeConfig(...layers: ConfigOverrides[]): AppConfig {
    let merged: AppConfig = { ...DEFAULT_CONFIG };

    for (const layer of layers) {
        merged = {
            ...merged,
            ...layer,
            endpoints: { ...merged.endpoints, ...layer.endpoints },
            timeouts: { ...merged.timeouts, ...layer.timeouts },
        };
    }

    return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
