import 'dotenv/config';
import path from 'path';
import { z } from 'zod';

const DEFAULT_LOOKUP_PATHS = '/product/{code},/v1/lookup/{code},/lookup?upc={code}';

/** Blank strings from .env files count as "not set". */
const optionalKey = z
    .string()
    .optional()
    .transform((val) => (val && val.trim() ? val.trim() : null));

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    DATA_DIR: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    OMDB_API_KEY: optionalKey,

    UPC_API_KEY: optionalKey,
    UPC_BASE_URL: z.string().url('UPC_BASE_URL must be a URL').default('https://api.upcdatabase.org'),
    UPC_LOOKUP_PATHS: z.string().default(DEFAULT_LOOKUP_PATHS),
    UPC_KEY_PARAM: z.string().min(1).default('apikey'),

    LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
    POSTER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
});

export interface AppConfig {
    port: number;
    dataDir: string;
    logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
    omdb: {
        apiKey: string | null;
        timeoutMs: number;
    };
    productLookup: {
        apiKey: string | null;
        baseUrl: string;
        /** Ordered path templates; `{code}` is replaced by the scanned code. */
        paths: string[];
        keyParam: string;
        timeoutMs: number;
    };
    posters: {
        timeoutMs: number;
    };
}

/**
 * Reads and validates configuration once. Throws with every offending
 * variable listed when the environment is invalid.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid environment variables: ${issues}`);
    }
    const env = parsed.data;

    const paths = env.UPC_LOOKUP_PATHS.split(',')
        .map((p) => p.trim())
        .filter((p) => p.length > 0);

    return {
        port: env.PORT,
        dataDir: path.resolve(env.DATA_DIR ?? path.join(process.cwd(), 'data')),
        logLevel: env.LOG_LEVEL,
        omdb: {
            apiKey: env.OMDB_API_KEY,
            timeoutMs: env.LOOKUP_TIMEOUT_MS,
        },
        productLookup: {
            apiKey: env.UPC_API_KEY,
            baseUrl: env.UPC_BASE_URL.replace(/\/+$/, ''),
            paths: paths.length > 0 ? paths : DEFAULT_LOOKUP_PATHS.split(','),
            keyParam: env.UPC_KEY_PARAM,
            timeoutMs: env.LOOKUP_TIMEOUT_MS,
        },
        posters: {
            timeoutMs: env.POSTER_TIMEOUT_MS,
        },
    };
}
