/**
 * ServerConfig — Environment Configuration
 *
 * All settings come from environment variables, parsed once at startup.
 * An invalid value aborts startup with a {@link ConfigError} that lists
 * every offending variable.
 *
 * | Variable                   | Default                               |
 * |----------------------------|---------------------------------------|
 * | `OPENDATA_SERVER_NAME`     | `opendata-mcp`                        |
 * | `OPENDATA_LOG_LEVEL`       | `info`                                |
 * | `OPENDATA_LOG_FORMAT`      | `pretty`                              |
 * | `OPENDATA_SBB_BASE_URL`    | `https://data.sbb.ch/api/explore/v2.1` |
 * | `OPENDATA_MAX_FRAME_BYTES` | `4194304` (4 MiB)                     |
 * | `NO_COLOR`                 | unset                                 |
 *
 * @module
 */
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { coerceNumber } from '../core/schema/params.js';
import { type LogFormat, type LogLevel } from '../observability/LogObserver.js';

export const DEFAULT_SBB_BASE_URL = 'https://data.sbb.ch/api/explore/v2.1';
export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

/** Resolved server settings. */
export interface ServerConfig {
    readonly serverName: string;
    readonly serverVersion: string;
    readonly logLevel: LogLevel;
    readonly logFormat: LogFormat;
    /** Explore API v2.1 root, without trailing slash */
    readonly sbbBaseUrl: string;
    readonly maxFrameBytes: number;
    readonly color: boolean | undefined;
}

const EnvSchema = z.object({
    OPENDATA_SERVER_NAME: z.string().min(1).default('opendata-mcp'),
    OPENDATA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    OPENDATA_LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
    OPENDATA_SBB_BASE_URL: z.string().url().default(DEFAULT_SBB_BASE_URL),
    OPENDATA_MAX_FRAME_BYTES: z.preprocess(
        coerceNumber,
        z.number().int().min(1024),
    ).default(DEFAULT_MAX_FRAME_BYTES),
    NO_COLOR: z.string().optional(),
});

/**
 * Parse the environment into a {@link ServerConfig}.
 *
 * Empty strings count as unset, matching how shells export blank values.
 *
 * @throws {ConfigError} When any variable is invalid
 */
export function loadConfig(
    env: Readonly<Record<string, string | undefined>> = process.env,
    serverVersion = '0.1.0',
): ServerConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value !== '') cleaned[key] = value;
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(
            issue => `${issue.path.join('.')}: ${issue.message}`,
        );
        throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`, problems);
    }

    const e = parsed.data;
    return {
        serverName: e.OPENDATA_SERVER_NAME,
        serverVersion,
        logLevel: e.OPENDATA_LOG_LEVEL,
        logFormat: e.OPENDATA_LOG_FORMAT,
        sbbBaseUrl: e.OPENDATA_SBB_BASE_URL.replace(/\/+$/, ''),
        maxFrameBytes: e.OPENDATA_MAX_FRAME_BYTES,
        color: 'NO_COLOR' in env ? false : undefined,
    };
}
