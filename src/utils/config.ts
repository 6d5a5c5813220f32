import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type ImportConfig, type TimeoutConfig } from '../types/index.js';
import { ConfigError } from '../errors.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration as accepted from any single source.
 */
export type ConfigOverrides = Partial<Omit<ImportConfig, 'timeouts'>> & {
    timeouts?: Partial<TimeoutConfig>;
};

const FileConfigSchema = z
    .object({
        sciteApiUrl: z.string().url(),
        fetchTallies: z.boolean(),
        batchSize: z.number().int().positive(),
        vivoBaseUrl: z.string().url(),
        namedGraph: z.string().url(),
        email: z.string(),
        password: z.string(),
        hashLength: z.number().int().min(1).max(32),
        reportBaseUrl: z.string(),
        output: z.string(),
        fallbackDir: z.string(),
        ledgerPath: z.string().nullable(),
        timeouts: z
            .object({
                papers: z.number().positive(),
                tallies: z.number().positive(),
                import: z.number().positive(),
            })
            .partial(),
        maxRetries: z.number().int().nonnegative(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

/**
 * Load configuration from scitevivo.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('scitevivo', {
        searchPlaces: ['scitevivo.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}: ${parsed.error.message}`);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const config: ConfigOverrides = {};

    if (env['SCITE_API_URL']) config.sciteApiUrl = env['SCITE_API_URL'];
    if (env['VIVO_BASE_URL']) config.vivoBaseUrl = env['VIVO_BASE_URL'];
    if (env['VIVO_EMAIL']) config.email = env['VIVO_EMAIL'];
    if (env['VIVO_PASSWORD']) config.password = env['VIVO_PASSWORD'];

    return config;
}

/**
 * Drop keys whose value is undefined so they do not shadow lower layers.
 */
function defined<T extends object>(value: T | null | undefined): Partial<T> {
    if (!value) return {};
    return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<ImportConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const merged: ImportConfig = {
        ...DEFAULT_CONFIG,
        ...defined(fileConfig),
        ...defined(envConfig),
        ...defined(cliFlags),
        // Deep merge nested objects
        timeouts: {
            ...DEFAULT_CONFIG.timeouts,
            ...defined(fileConfig?.timeouts),
            ...defined(cliFlags.timeouts),
        },
    };

    return merged;
}
