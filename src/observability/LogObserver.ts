/**
 * LogObserver — stderr Log Sink for Debug Events
 *
 * stdout carries the protocol, so every log line goes to stderr (or the
 * stream passed in). Two formats:
 *
 *   - `pretty`: timestamped, tagged lines, colored when the stream is a TTY
 *     and `NO_COLOR` is unset
 *   - `json`: one NDJSON object per event, for log shippers
 *
 * ```
 * 2026-01-05T10:00:00.000Z [ REQ] rail-traffic-info #1
 * 2026-01-05T10:00:00.001Z [ ZOD] rail-traffic-info ✓ 0.2ms
 * 2026-01-05T10:00:00.180Z [EXEC] rail-traffic-info ✓ 179.4ms
 * ```
 *
 * @module
 */
import pc from 'picocolors';
import { type DebugEvent, type DebugObserverFn } from './DebugObserver.js';

// ============================================================================
// Levels
// ============================================================================

/** Minimum severity written by the sink. `silent` writes nothing. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Output encoding of the sink. */
export type LogFormat = 'pretty' | 'json';

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: Number.POSITIVE_INFINITY,
};

/** Severity of an event, used for level filtering and the JSON `level` field. */
export function eventLevel(event: DebugEvent): Exclude<LogLevel, 'silent'> {
    switch (event.type) {
        case 'route':     return 'debug';
        case 'validate':  return event.valid ? 'debug' : 'warn';
        case 'execute':   return event.isError ? 'warn' : 'info';
        case 'error':     return 'error';
        case 'protocol':  return 'warn';
        case 'lifecycle': return 'info';
    }
}

// ============================================================================
// Formatters
// ============================================================================

type Colors = ReturnType<typeof pc.createColors>;

function ms(value: number): string {
    return `${value.toFixed(1)}ms`;
}

/** Render an event as one human-readable line (no trailing newline). */
export function formatEventPretty(event: DebugEvent, c: Colors = pc.createColors(false)): string {
    const ts = c.dim(new Date(event.timestamp).toISOString());
    const tag = (label: string, color: (s: string) => string): string => color(`[${label}]`);

    switch (event.type) {
        case 'route':
            return `${ts} ${tag(' REQ', c.cyan)} ${c.bold(event.tool)} #${event.requestId}`;

        case 'validate': {
            const status = event.valid
                ? c.green('✓')
                : c.red(`✗ ${event.error ?? 'invalid'}`);
            return `${ts} ${tag(' ZOD', c.yellow)} ${event.tool} ${status} ${c.dim(ms(event.durationMs))}`;
        }

        case 'execute': {
            const icon = event.isError ? c.red('✗') : c.green('✓');
            return `${ts} ${tag('EXEC', c.green)} ${event.tool} ${icon} ${c.dim(ms(event.durationMs))}`;
        }

        case 'error':
            return `${ts} ${tag(' ERR', c.red)} ${c.red(`${event.tool} → ${event.kind}: ${event.error} [${event.step}]`)}`;

        case 'protocol': {
            const id = event.requestId === undefined ? '' : ` id=${String(event.requestId)}`;
            return `${ts} ${tag('RPC ', c.magenta)} ${event.code} ${event.message}${id}`;
        }

        case 'lifecycle': {
            const detail = event.detail ? ` ${c.dim(event.detail)}` : '';
            return `${ts} ${tag('CONN', c.blue)} ${event.state} inFlight=${event.inFlight}${detail}`;
        }
    }
}

/** Render an event as one NDJSON object (no trailing newline). */
export function formatEventJson(event: DebugEvent): string {
    const base: Record<string, unknown> = {
        time: new Date(event.timestamp).toISOString(),
        level: eventLevel(event),
        event: event.type,
    };
    for (const [key, value] of Object.entries(event)) {
        if (key === 'type' || key === 'timestamp') continue;
        base[key] = value;
    }
    return JSON.stringify(base);
}

// ============================================================================
// Factory
// ============================================================================

/** Anything with a `write(string)` method; `process.stderr` by default. */
export interface LogStream {
    write(chunk: string): unknown;
    readonly isTTY?: boolean;
}

export interface LogObserverOptions {
    readonly level?: LogLevel;
    readonly format?: LogFormat;
    readonly stream?: LogStream;
    /** Force colors on or off. Defaults to TTY detection plus `NO_COLOR`. */
    readonly color?: boolean;
}

/**
 * Create an observer that writes one line per event.
 *
 * @example
 * ```typescript
 * const observer = createLogObserver({ level: 'warn', format: 'json' });
 * ```
 */
export function createLogObserver(options: LogObserverOptions = {}): DebugObserverFn {
    const threshold = SEVERITY[options.level ?? 'info'];
    const stream = options.stream ?? process.stderr;
    const useColor = options.color ?? (!('NO_COLOR' in process.env) && stream.isTTY === true);
    const colors = pc.createColors(useColor);
    const format = options.format ?? 'pretty';

    return (event) => {
        if (SEVERITY[eventLevel(event)] < threshold) return;
        const line = format === 'json'
            ? formatEventJson(event)
            : formatEventPretty(event, colors);
        stream.write(line + '\n');
    };
}
