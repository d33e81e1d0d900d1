/**
 * HTTP JSON Fetch — the Handler's Single Upstream Exchange
 *
 * One GET, one JSON body, one Zod check. Failures are raised as the typed
 * errors the invocation adapter classifies:
 *
 * - network failure or non-2xx status → {@link UpstreamUnavailableError}
 * - body that is not JSON, or does not match the schema →
 *   {@link UpstreamMalformedResponseError}
 *
 * `fetch` is injected through {@link HttpClient} so tests can stub the
 * upstream without touching the network.
 *
 * @module
 */
import { type ZodTypeAny, type output } from 'zod';
import {
    UpstreamUnavailableError,
    UpstreamMalformedResponseError,
} from '../core/errors.js';

// ── Types ────────────────────────────────────────────────

/** The subset of the global `fetch` signature the providers use. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClient {
    readonly fetch: FetchFn;
    readonly userAgent?: string;
}

/** Query values; `undefined` entries are omitted from the URL. */
export type QueryValue = string | number | boolean | undefined;

/** Longest upstream error body echoed back into an error message. */
const MAX_ERROR_BODY = 300;

// ── URL Building ─────────────────────────────────────────

/**
 * Append query parameters to a URL, skipping `undefined` values.
 *
 * @example
 * ```typescript
 * buildUrl('https://example.test/records', { limit: 5, where: undefined, include_links: false });
 * // 'https://example.test/records?limit=5&include_links=false'
 * ```
 */
export function buildUrl(base: string, query: Readonly<Record<string, QueryValue>>): string {
    const url = new URL(base);
    for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
}

// ── Fetch ────────────────────────────────────────────────

/**
 * GET `url` with `query` and validate the JSON body against `schema`.
 *
 * @throws {UpstreamUnavailableError} On network failure or a non-2xx status
 * @throws {UpstreamMalformedResponseError} On a non-JSON or mis-shaped body
 */
export async function fetchJson<TSchema extends ZodTypeAny>(
    http: HttpClient,
    url: string,
    query: Readonly<Record<string, QueryValue>>,
    schema: TSchema,
): Promise<output<TSchema>> {
    const target = buildUrl(url, query);
    const headers: Record<string, string> = { accept: 'application/json' };
    if (http.userAgent) headers['user-agent'] = http.userAgent;

    let response: Response;
    try {
        response = await http.fetch(target, { method: 'GET', headers });
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new UpstreamUnavailableError(
            `Request to ${hostOf(target)} failed: ${reason}`,
            target,
            undefined,
            { cause: err },
        );
    }

    if (!response.ok) {
        const body = await readErrorBody(response);
        throw new UpstreamUnavailableError(
            `${hostOf(target)} answered ${response.status}${body ? `: ${body}` : ''}`,
            target,
            response.status,
        );
    }

    let json: unknown;
    try {
        json = await response.json();
    } catch (err) {
        throw new UpstreamMalformedResponseError(
            `${hostOf(target)} returned a body that is not JSON`,
            target,
            [],
            { cause: err },
        );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`,
        );
        throw new UpstreamMalformedResponseError(
            `${hostOf(target)} returned an unexpected payload (${issues.slice(0, 3).join('; ')})`,
            target,
            issues,
        );
    }
    return parsed.data;
}

// ── Helpers ──────────────────────────────────────────────

function hostOf(url: string): string {
    return new URL(url).host;
}

/**
 * Short form of an error body. Explore API errors are JSON with a
 * `message` field; anything else is echoed truncated.
 */
async function readErrorBody(response: Response): Promise<string> {
    let text: string;
    try {
        text = await response.text();
    } catch (err) {
        return `(body unreadable: ${err instanceof Error ? err.message : String(err)})`;
    }
    const message = extractMessage(text) ?? text.trim();
    return message.length > MAX_ERROR_BODY ? `${message.slice(0, MAX_ERROR_BODY)}...` : message;
}

function extractMessage(text: string): string | undefined {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch {
        return undefined;
    }
    if (typeof json === 'object' && json !== null && 'message' in json && typeof json.message === 'string') {
        return json.message;
    }
    return undefined;
}
