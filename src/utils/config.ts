import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type KnowledgeGraphConfig, type LogLevel } from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration. Arrays are replaced wholesale, objects merge key by key.
 */
export type DeepPartial<T> = T extends readonly unknown[]
    ? T
    : T extends object
      ? { [K in keyof T]?: DeepPartial<T[K]> }
      : T;

export type ConfigOverrides = DeepPartial<KnowledgeGraphConfig>;

const unitInterval = z.number().min(0).max(1);
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const mentionType = z.enum(['organization', 'person', 'product', 'location', 'other']);
const predicate = z.enum([
    'investment',
    'acquisition',
    'cooperation',
    'employment',
    'subsidiary',
    'competition',
    'supply',
    'product',
    'location',
    'related',
]);

const configSchema: z.ZodType<KnowledgeGraphConfig> = z
    .object({
        extraction: z.object({
            mentionConfidenceFloor: unitInterval,
            relationConfidenceFloor: unitInterval,
            proximityWindow: z.number().int().positive(),
            sentenceScoped: z.boolean(),
            cooccurrence: z.boolean(),
            mutuallyExclusive: z.array(z.array(predicate).min(2)),
            knownEntities: z.array(
                z.object({
                    name: z.string().min(1),
                    type: mentionType,
                    aliases: z.array(z.string().min(1)).optional(),
                })
            ),
        }),
        temporal: z.object({
            referenceDatePolicy: z.enum(['document', 'fixed', 'none']),
            referenceDate: isoDate.optional(),
        }),
        linking: z.object({
            mergeThreshold: unitInterval,
            reviewThreshold: unitInterval,
            semantic: z.object({
                enabled: z.boolean(),
                threshold: unitInterval,
                ngram: z.number().int().min(1).max(8),
            }),
        }),
        events: z.object({
            confidenceFloor: unitInterval,
        }),
        storage: z.object({
            path: z.string().min(1),
            maxRetries: z.number().int().min(0),
            initialBackoffMs: z.number().min(0),
            maxBackoffMs: z.number().min(0),
        }),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .superRefine((config, ctx) => {
        if (config.linking.reviewThreshold > config.linking.mergeThreshold) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['linking', 'reviewThreshold'],
                message: 'reviewThreshold must not exceed mergeThreshold',
            });
        }
        const { semantic, mergeThreshold } = config.linking;
        if (semantic.enabled && semantic.threshold < mergeThreshold) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['linking', 'semantic', 'threshold'],
                message: 'semantic.threshold must not be below mergeThreshold',
            });
        }
        if (config.temporal.referenceDatePolicy === 'fixed' && !config.temporal.referenceDate) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['temporal', 'referenceDate'],
                message: "referenceDate is required when referenceDatePolicy is 'fixed'",
            });
        }
    });

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` onto `base`. Undefined values in the override are ignored.
 */
function deepMerge(base: unknown, override: unknown): unknown {
    if (override === undefined) return base;
    if (!isPlainObject(base) || !isPlainObject(override)) return override;

    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
        merged[key] = deepMerge(base[key], value);
    }
    return merged;
}

/**
 * Validate a fully merged configuration object.
 */
export function validateConfig(candidate: unknown): KnowledgeGraphConfig {
    const result = configSchema.safeParse(candidate);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

/**
 * Build a configuration object from defaults plus any number of override
 * layers (later layers win).
 */
export function createConfig(...layers: unknown[]): KnowledgeGraphConfig {
    let merged: unknown = DEFAULT_CONFIG;
    for (const layer of layers) {
        merged = deepMerge(merged, layer);
    }
    return validateConfig(merged);
}

/**
 * Load configuration from finkg.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply then.
 */
async function loadConfigFile(searchFrom?: string): Promise<unknown> {
    const explorer = cosmiconfig('finkg', {
        searchPlaces: ['finkg.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            const config: unknown = result.config;
            return config;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const dbPath = process.env['FINKG_DB'];
    if (dbPath) {
        env.storage = { path: dbPath };
    }

    const level = process.env['FINKG_LOG_LEVEL'];
    const levels: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];
    const match = levels.find((l) => l === level);
    if (match) {
        env.logLevel = match;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<KnowledgeGraphConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    return createConfig(fileConfig ?? undefined, envConfig, cliFlags);
}
