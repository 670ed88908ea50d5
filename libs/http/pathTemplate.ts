/**
 * Path templates of the form /contracts/{contractId}/products/{productId}.
 * Registry entries are keyed by template; requests arrive with concrete
 * paths. This is where one is matched against the other.
 */

import { normalizeVerb, type RegisteredRule } from '../security/registry.js';

const PARAM_SEGMENT = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;
const ROUTE_PARAM_SEGMENT = /^:([A-Za-z_][A-Za-z0-9_]*)$/;

function segmentsOf(path: string): string[] {
    const trimmed = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
    return trimmed.split('/');
}

function decodeSegment(segment: string): string | null {
    try {
        return decodeURIComponent(segment);
    } catch {
        return null;
    }
}

/**
 * Returns the captured parameters, or null when the path does not match.
 * Literal segments compare case-insensitively, as express routes do.
 */
export function matchPathTemplate(template: string, path: string): Record<string, string> | null {
    const expected = segmentsOf(template);
    const actual = segmentsOf(path);
    if (expected.length !== actual.length) return null;

    const params: Record<string, string> = {};
    for (let i = 0; i < expected.length; i++) {
        const pattern = expected[i] ?? '';
        const segment = actual[i] ?? '';
        const param = PARAM_SEGMENT.exec(pattern);

        if (param) {
            const value = segment ? decodeSegment(segment) : null;
            if (!value) return null;
            params[param[1] ?? ''] = value;
        } else if (pattern.toLowerCase() !== segment.toLowerCase()) {
            return null;
        }
    }

    return params;
}

/** Number of literal (non-parameter) segments. */
export function templateSpecificity(template: string): number {
    return segmentsOf(template).filter(segment => segment !== '' && !PARAM_SEGMENT.test(segment)).length;
}

/**
 * Template of the registered rule that governs a concrete request: an exact
 * entry first, then the matching template with the most literal segments.
 */
export function findRegisteredPattern(
    rules: Iterable<RegisteredRule>,
    verb: string,
    path: string
): string | null {
    const normalizedVerb = normalizeVerb(verb);
    let best: { path: string; specificity: number } | null = null;

    for (const rule of rules) {
        if (rule.verb !== normalizedVerb) continue;
        if (rule.path === path) return rule.path;
        if (!matchPathTemplate(rule.path, path)) continue;

        const specificity = templateSpecificity(rule.path);
        if (!best || specificity > best.specificity || (specificity === best.specificity && rule.path < best.path)) {
            best = { path: rule.path, specificity };
        }
    }

    return best?.path ?? null;
}

/** /contracts/{contractId} → /contracts/:contractId */
export function toExpressPath(template: string): string {
    return segmentsOf(template)
        .map(segment => {
            const param = PARAM_SEGMENT.exec(segment);
            return param ? `:${param[1] ?? ''}` : segment;
        })
        .join('/');
}

/** /contracts/:contractId → /contracts/{contractId} */
export function fromExpressPath(routePath: string): string {
    return segmentsOf(routePath)
        .map(segment => {
            const param = ROUTE_PARAM_SEGMENT.exec(segment);
            return param ? `{${param[1] ?? ''}}` : segment;
        })
        .join('/');
}
