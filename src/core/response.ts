/**
 * Response Helpers — Content Envelope Builder
 *
 * Builds the `tools/call` result payload. Every call produces exactly one
 * {@link ToolResponse}: a success carries the handler's rendered result,
 * a failure carries one text block tagged with a stable error kind.
 *
 * @example
 * ```typescript
 * import { success, toolError, toonSuccess } from 'opendata-mcp';
 *
 * // Object response (pretty-printed JSON)
 * return success({ total_count: 1, results: [...] });
 *
 * // TOON-encoded response (tabular, fewer tokens)
 * return toonSuccess(results);
 *
 * // Classified failure
 * return toolError('UpstreamUnavailable', { message: 'data.sbb.ch answered 503' });
 * ```
 *
 * @module
 */
import { encode, type EncodeOptions } from '@toon-format/toon';
import { type ToolErrorKind } from './errors.js';

// ============================================================================
// XML Safety
// ============================================================================

/**
 * Escape XML structural characters for element content.
 *
 * Only `&` and `<` are mandatory escapes in element content; `>` is kept
 * for readability (`limit >= 1`).
 *
 * @internal
 */
export function escapeXml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;');
}

/**
 * Escape all five XML special characters for attribute values.
 *
 * @internal
 */
export function escapeXmlAttr(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

// ============================================================================
// Content Blocks
// ============================================================================

/** Plain text block. The only block kind the built-in renderers emit. */
export interface TextContent {
    readonly type: 'text';
    readonly text: string;
}

/** Base64-encoded image block. */
export interface ImageContent {
    readonly type: 'image';
    readonly data: string;
    readonly mimeType: string;
}

/** Embedded resource contents, either textual or base64 binary. */
export type ResourceContents =
    | { readonly uri: string; readonly mimeType?: string; readonly text: string }
    | { readonly uri: string; readonly mimeType?: string; readonly blob: string };

/** Embedded resource block. */
export interface EmbeddedResource {
    readonly type: 'resource';
    readonly resource: ResourceContents;
}

/** Tagged union of every content block a tool result may carry. */
export type ContentBlock = TextContent | ImageContent | EmbeddedResource;

// ============================================================================
// Types
// ============================================================================

/**
 * Wire-level tool call result.
 *
 * Handlers may return this shape directly when they need image or resource
 * blocks; otherwise they return plain data and the pipeline renders it.
 *
 * @example
 * ```typescript
 * const response: ToolResponse = {
 *     content: [image(pngBase64, 'image/png')],
 * };
 * ```
 */
export interface ToolResponse {
    readonly content: readonly ContentBlock[];
    readonly isError?: boolean;
    readonly _meta?: Readonly<Record<string, unknown>>;
}

/** How a handler's raw result is turned into text. */
export type RenderFormat = 'json' | 'toon';

// ============================================================================
// Response Builders
// ============================================================================

/**
 * Create a success response from text or a JSON-serializable value.
 *
 * - Strings are returned verbatim (empty strings become `"OK"`)
 * - Everything else is serialized with `JSON.stringify(data, null, 2)`
 *
 * @example
 * ```typescript
 * return success('Nothing to report');
 * return success({ total_count: 0, results: [] });
 * ```
 */
export function success(data: unknown): ToolResponse {
    const text = typeof data === 'string'
        ? (data || 'OK')
        : (JSON.stringify(data, null, 2) ?? 'null');
    return { content: [{ type: 'text', text }] };
}

/**
 * Create a success response with a TOON-encoded payload.
 *
 * TOON folds arrays of uniform objects into a header row plus one line per
 * record, which suits the flat result lists open-data portals return.
 *
 * @param options - TOON encode options (default: pipe delimiter)
 */
export function toonSuccess(data: unknown, options?: EncodeOptions): ToolResponse {
    const defaults: EncodeOptions = { delimiter: '|' };
    const text = encode(data, { ...defaults, ...options });
    return { content: [{ type: 'text', text }] };
}

/**
 * Render a handler's raw result with the tool's configured format.
 * Strings bypass the encoder in both formats.
 */
export function render(data: unknown, format: RenderFormat = 'json'): ToolResponse {
    if (format === 'toon' && typeof data !== 'string') return toonSuccess(data);
    return success(data);
}

/** Build an image content block. */
export function image(data: string, mimeType: string): ImageContent {
    return { type: 'image', data, mimeType };
}

/** Build a textual embedded-resource content block. */
export function resource(uri: string, text: string, mimeType?: string): EmbeddedResource {
    return {
        type: 'resource',
        resource: mimeType !== undefined ? { uri, mimeType, text } : { uri, text },
    };
}

// ============================================================================
// Classified Errors
// ============================================================================

/** Options for {@link toolError}. */
export interface ToolErrorOptions {
    /** Human-readable description of what went wrong */
    readonly message: string;
    /** What the caller should do next */
    readonly suggestion?: string;
    /** Names the caller may use instead (e.g. the registered tools) */
    readonly availableTools?: readonly string[];
    /** Preformatted XML lines placed after `<message>` (validation reports) */
    readonly details?: string;
}

/**
 * Create a classified error response.
 *
 * The text block is a small XML document so LLM callers can parse it, and
 * `_meta.errorKind` carries the same tag for programmatic branching.
 *
 * @example
 * ```typescript
 * return toolError('UnknownTool', {
 *     message: 'Tool "trains" does not exist.',
 *     availableTools: ['rail-traffic-info'],
 * });
 * // <tool_error code="UnknownTool">
 * // <message>Tool "trains" does not exist.</message>
 * // <available_tools>rail-traffic-info</available_tools>
 * // </tool_error>
 * ```
 */
export function toolError(kind: ToolErrorKind, options: ToolErrorOptions): ToolResponse {
    const parts: string[] = [`<tool_error code="${escapeXmlAttr(kind)}">`];

    parts.push(`<message>${escapeXml(options.message)}</message>`);
    if (options.details) parts.push(options.details);
    if (options.availableTools && options.availableTools.length > 0) {
        parts.push(`<available_tools>${escapeXml(options.availableTools.join(', '))}</available_tools>`);
    }
    if (options.suggestion) {
        parts.push(`<recovery>${escapeXml(options.suggestion)}</recovery>`);
    }
    parts.push('</tool_error>');

    return {
        content: [{ type: 'text', text: parts.join('\n') }],
        isError: true,
        _meta: { errorKind: kind },
    };
}

// ============================================================================
// Type Guards
// ============================================================================

const CONTENT_TYPES: ReadonlySet<string> = new Set(['text', 'image', 'resource']);

/**
 * Whether a handler returned a ready-made {@link ToolResponse} rather than
 * raw data. Checks the `content` array shape, not just its presence.
 */
export function isToolResponse(value: unknown): value is ToolResponse {
    if (typeof value !== 'object' || value === null || !('content' in value)) return false;
    const content: unknown = value.content;
    return Array.isArray(content) && content.every((block: unknown) =>
        typeof block === 'object' &&
        block !== null &&
        'type' in block &&
        typeof block.type === 'string' &&
        CONTENT_TYPES.has(block.type),
    );
}
