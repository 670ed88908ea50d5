/**
 * Context strategies
 *
 * A strategy knows how to find the caller's identity and tenant in one kind
 * of inbound request (trusted headers, verified token claims, ...). Everything
 * after those two steps is shared by the ContextResolver.
 */

/** Transport-neutral view of an inbound request. */
export interface InboundRequest {
    readonly headers: Readonly<Record<string, string | string[] | undefined>>;
    readonly path?: string;
}

export interface ContextStrategy {
    readonly name: string;
    /** Higher wins. */
    readonly priority: number;
    supports(request: InboundRequest): boolean;
    resolveIdentity(request: InboundRequest): Promise<string | null>;
    /** Never reads a tenant the caller declares about itself. */
    resolveTenant(request: InboundRequest, identityId: string): Promise<string | null>;
}

/**
 * Highest-priority supporting strategy; ties go to the earliest registered.
 */
export function selectStrategy(
    strategies: readonly ContextStrategy[],
    request: InboundRequest
): ContextStrategy | null {
    let selected: ContextStrategy | null = null;

    for (const strategy of strategies) {
        if (!strategy.supports(request)) continue;
        if (!selected || strategy.priority > selected.priority) {
            selected = strategy;
        }
    }

    return selected;
}

/**
 * First non-blank value of a header, trimmed. Header names are matched
 * lower-case, as Node delivers them.
 */
export function readHeader(request: InboundRequest, name: string): string | null {
    const raw = request.headers[name.toLowerCase()];
    const value = Array.isArray(raw) ? raw[0] : raw;
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}
