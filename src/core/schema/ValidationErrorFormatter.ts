/**
 * ValidationErrorFormatter — LLM-Friendly Validation Reports
 *
 * Turns {@link FieldIssue}s into `<field>` lines the caller can act on:
 *
 *   <field name="limit" reason="too_big">must be &lt;= 100. You sent: 500.</field>
 *   <field name="lang" reason="invalid_enum">must be one of 'de', 'fr'. You sent: 'es'.</field>
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import { escapeXml, escapeXmlAttr } from '../response.js';
import { type FieldIssue } from './SchemaValidator.js';

/** Recovery hint attached to every validation failure envelope. */
export const VALIDATION_RECOVERY = 'Fix the fields above and call the tool again.';

/**
 * Format field issues as XML lines for the `tools/call` error envelope.
 *
 * @param issues - Issues from {@link validateArgs}
 * @param sentArgs - The raw args the caller sent (for "You sent:" hints)
 */
export function formatValidationIssues(
    issues: readonly FieldIssue[],
    sentArgs: unknown,
): string {
    return issues.map((issue) => {
        let detail = `${issue.message}.`;
        if (issue.reason !== 'missing') {
            const sent = formatSentValue(resolveValue(sentArgs, issue.field));
            if (sent !== undefined) detail += ` You sent: ${sent}.`;
        }
        return `<field name="${escapeXmlAttr(issue.field)}" reason="${issue.reason}">${escapeXml(detail)}</field>`;
    }).join('\n');
}

// ── Value Resolution ─────────────────────────────────────

/** Resolve a dotted issue path against the raw args. */
function resolveValue(args: unknown, field: string): unknown {
    if (field === '(root)') return args;
    let current: unknown = args;
    for (const key of field.split('.')) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, key);
    }
    return current;
}

/** Short display form of a sent value; long strings are truncated. */
function formatSentValue(value: unknown): string | undefined {
    if (value === undefined) return undefined;
    if (value === null) return 'null';
    if (typeof value === 'string') {
        const truncated = value.length > 50 ? value.slice(0, 47) + '...' : value;
        return `'${truncated}'`;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    if (Array.isArray(value)) {
        return `array(${value.length})`;
    }
    return JSON.stringify(value).slice(0, 50);
}
