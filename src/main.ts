#!/usr/bin/env node
/**
 * opendata-mcp — stdio entry point
 *
 * Loads configuration from the environment, registers the SBB and finance
 * tools and serves JSON-RPC on stdin/stdout until stdin ends. Logs go to
 * stderr.
 *
 * Exit codes: 0 after a clean drain, 1 on a startup failure.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import pc from 'picocolors';
import { loadConfig } from './config/ServerConfig.js';
import { ToolRegistry } from './core/registry/ToolRegistry.js';
import { ConfigError } from './core/errors.js';
import { createLogObserver } from './observability/LogObserver.js';
import { startServer } from './server/startServer.js';
import { sbbTools, type ProviderContext } from './providers/sbb/index.js';
import { financeTools, createYahooScreenerClient, type FinanceContext } from './providers/finance/index.js';

type AppContext = ProviderContext & FinanceContext;

const PackageJson = z.object({ version: z.string() });

function readVersion(): string {
    const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    return PackageJson.parse(raw).version;
}

async function main(): Promise<void> {
    const version = readVersion();
    const config = loadConfig(process.env, version);

    const registry = new ToolRegistry<AppContext>();
    registry.registerAll(...sbbTools, ...financeTools);
    registry.seal();

    const { closed } = await startServer({
        serverInfo: { name: config.serverName, version: config.serverVersion },
        registry,
        context: {
            http: { fetch, userAgent: `${config.serverName}/${config.serverVersion}` },
            sbbBaseUrl: config.sbbBaseUrl,
            finance: createYahooScreenerClient(),
        },
        observer: createLogObserver({
            level: config.logLevel,
            format: config.logFormat,
            ...(config.color !== undefined ? { color: config.color } : {}),
        }),
        maxFrameBytes: config.maxFrameBytes,
    });

    await closed;
}

main().then(
    () => {
        process.exitCode = 0;
    },
    (err: unknown) => {
        const c = pc.createColors(!('NO_COLOR' in process.env) && process.stderr.isTTY);
        const message = err instanceof ConfigError
            ? err.message
            : err instanceof Error ? (err.stack ?? err.message) : String(err);
        process.stderr.write(`${c.red('✗')} opendata-mcp failed to start\n${message}\n`);
        process.exitCode = 1;
    },
);
