import { cosmiconfig } from 'cosmiconfig';
import {
    ALL_SOURCES,
    DEFAULT_CONFIG,
    ENTREZ_SOURCES,
    NCBI_RATE_WITH_KEY,
    Source,
    parseSource,
    type CacheConfig,
    type LogLevel,
    type RetryConfig,
    type ScifetchConfig,
    type SourceConfig,
} from '../types/index.js';
import { isRecord } from '../sources/utils.js';
import { getLogger, parseLogLevel } from './logger.js';

/**
 * Partial configuration as read from a file, the environment or CLI flags.
 * Keys left out keep the value of the layer below.
 */
export interface ConfigOverrides {
    sources?: Partial<Record<Source, Partial<SourceConfig>>>;
    retry?: Partial<RetryConfig>;
    cache?: Partial<CacheConfig>;
    email?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

export interface ResolveConfigOptions {
    /** Directory to search for a config file (defaults to the working directory) */
    searchFrom?: string;

    /** Explicit config file, skips the search */
    configPath?: string;

    env?: NodeJS.ProcessEnv;
}

const SOURCE_NUMBER_KEYS = ['requestsPerSecond', 'burst', 'ttlSeconds', 'timeoutMs'] as const;
const RETRY_KEYS = ['maxAttempts', 'baseDelayMs', 'maxDelayMs'] as const;

function readNonNegative(value: Record<string, unknown>, key: string): number | undefined {
    const member = value[key];
    return typeof member === 'number' && Number.isFinite(member) && member >= 0 ? member : undefined;
}

function parseSourceOverrides(value: unknown, source: Source): Partial<SourceConfig> {
    const result: Partial<SourceConfig> = {};
    if (!isRecord(value)) {
        getLogger().warn({ source }, 'Ignoring non-object source configuration');
        return result;
    }

    if (typeof value['baseUrl'] === 'string') result.baseUrl = value['baseUrl'].replace(/\/+$/, '');
    for (const key of SOURCE_NUMBER_KEYS) {
        const number = readNonNegative(value, key);
        if (number !== undefined) result[key] = number;
    }

    const auth = value['auth'];
    if (isRecord(auth) && typeof auth['param'] === 'string' && typeof auth['value'] === 'string') {
        result.auth = { param: auth['param'], value: auth['value'] };
    }
    return result;
}

/**
 * Validate the contents of a config file. Unknown sources and mistyped values are
 * dropped with a warning.
 */
export function parseConfigOverrides(value: unknown): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (!isRecord(value)) return overrides;

    const sources = value['sources'];
    if (isRecord(sources)) {
        overrides.sources = {};
        for (const [name, sourceValue] of Object.entries(sources)) {
            const source = parseSource(name);
            if (!source) {
                getLogger().warn({ source: name }, 'Ignoring configuration for unknown source');
                continue;
            }
            overrides.sources[source] = parseSourceOverrides(sourceValue, source);
        }
    }

    const retry = value['retry'];
    if (isRecord(retry)) {
        overrides.retry = {};
        for (const key of RETRY_KEYS) {
            const number = readNonNegative(retry, key);
            if (number !== undefined) overrides.retry[key] = number;
        }
    }

    const cache = value['cache'];
    if (isRecord(cache)) {
        const maxEntries = readNonNegative(cache, 'maxEntries');
        overrides.cache = maxEntries !== undefined ? { maxEntries } : {};
    }

    if (typeof value['email'] === 'string' && value['email']) overrides.email = value['email'];
    const logLevel = parseLogLevel(value['logLevel']);
    if (logLevel) overrides.logLevel = logLevel;
    if (typeof value['jsonLogs'] === 'boolean') overrides.jsonLogs = value['jsonLogs'];

    return overrides;
}

/**
 * Load configuration from scifetch.config.json or .scifetchrc.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(options: ResolveConfigOptions): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('scifetch', {
        searchPlaces: ['scifetch.config.json', '.scifetchrc.json'],
    });

    try {
        const result = options.configPath
            ? await explorer.load(options.configPath)
            : await explorer.search(options.searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parseConfigOverrides(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * NCBI API key from the environment.
 */
export function ncbiApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
    return env['NCBI_API_KEY'] || env['PUBMED_API_KEY'] || undefined;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const apiKey = ncbiApiKey(env);
    if (apiKey) {
        overrides.sources = {};
        for (const source of ENTREZ_SOURCES) {
            overrides.sources[source] = { auth: { param: 'api_key', value: apiKey } };
        }
    }

    const email = env['SCIFETCH_EMAIL'] || env['CROSSREF_MAILTO'];
    if (email) overrides.email = email;

    const logLevel = parseLogLevel(env['SCIFETCH_LOG_LEVEL']);
    if (logLevel) overrides.logLevel = logLevel;

    return overrides;
}

/**
 * Apply one layer of overrides. Sources are merged field by field.
 */
export function mergeConfig(base: ScifetchConfig, overrides: ConfigOverrides | null): ScifetchConfig {
    if (!overrides) return base;

    const sources = { ...base.sources };
    for (const source of ALL_SOURCES) {
        const sourceOverrides = overrides.sources?.[source];
        if (sourceOverrides) {
            sources[source] = { ...sources[source], ...sourceOverrides };
        }
    }

    return {
        sources,
        retry: { ...base.retry, ...overrides.retry },
        cache: { ...base.cache, ...overrides.cache },
        email: overrides.email ?? base.email,
        logLevel: overrides.logLevel ?? base.logLevel,
        jsonLogs: overrides.jsonLogs ?? base.jsonLogs,
    };
}

/**
 * With an NCBI API key, Entrez sources default to 10 requests/second instead of 3.
 */
function withKeyedEntrezDefaults(base: ScifetchConfig): ScifetchConfig {
    const sources = { ...base.sources };
    for (const source of ENTREZ_SOURCES) {
        sources[source] = { ...sources[source], requestsPerSecond: NCBI_RATE_WITH_KEY, burst: NCBI_RATE_WITH_KEY };
    }
    return { ...base, sources };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides = {},
    options: ResolveConfigOptions = {}
): Promise<ScifetchConfig> {
    const env = options.env ?? process.env;
    const defaults = ncbiApiKey(env) ? withKeyedEntrezDefaults(DEFAULT_CONFIG) : DEFAULT_CONFIG;

    const fileConfig = await loadConfigFile(options);
    const merged = mergeConfig(mergeConfig(mergeConfig(defaults, fileConfig), loadEnvVars(env)), cliFlags);

    // The contact address doubles as CrossRef's polite-pool parameter
    const crossref = merged.sources[Source.CrossRef];
    if (merged.email && !crossref.auth) {
        merged.sources[Source.CrossRef] = { ...crossref, auth: { param: 'mailto', value: merged.email } };
    }

    return merged;
}
