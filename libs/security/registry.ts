/**
 * Endpoint Security Registry
 *
 * Process-wide table of explicit per-operation requirements keyed by the
 * exact (path pattern, verb) pair. Lookups are exact: matching a concrete
 * request path against a pattern is the caller's job.
 *
 * Every write replaces the entry object as a whole, and listAll() hands
 * out a snapshot, so readers never see a half-written entry.
 */

import { logger } from '../logging/logger.js';
import type { SecurityRequirement } from './requirement.js';

export interface RegisteredRule {
    readonly path: string;
    readonly verb: string;
    readonly requirement: SecurityRequirement;
    readonly registeredAt: string;
}

export interface RequirementLookup {
    get(path: string, verb: string): SecurityRequirement | null;
}

export function normalizeVerb(verb: string): string {
    return verb.trim().toUpperCase();
}

export function registryKey(path: string, verb: string): string {
    return `${normalizeVerb(verb)} ${path}`;
}

export class EndpointSecurityRegistry implements RequirementLookup {
    private readonly entries = new Map<string, RegisteredRule>();

    public register(path: string, verb: string, requirement: SecurityRequirement): void {
        if (!path) {
            throw new Error('Security registry path must not be empty');
        }
        const normalizedVerb = normalizeVerb(verb);
        if (!normalizedVerb) {
            throw new Error(`Security registry verb must not be empty (path: ${path})`);
        }

        const key = registryKey(path, normalizedVerb);
        const replaced = this.entries.has(key);
        this.entries.set(key, Object.freeze({
            path,
            verb: normalizedVerb,
            requirement,
            registeredAt: new Date().toISOString()
        }));

        logger.info({ path, verb: normalizedVerb, replaced }, 'Endpoint security rule registered');
    }

    /**
     * Returns true when an entry was removed.
     */
    public unregister(path: string, verb: string): boolean {
        const removed = this.entries.delete(registryKey(path, verb));
        if (removed) {
            logger.info({ path, verb: normalizeVerb(verb) }, 'Endpoint security rule unregistered');
        }
        return removed;
    }

    public get(path: string, verb: string): SecurityRequirement | null {
        return this.entries.get(registryKey(path, verb))?.requirement ?? null;
    }

    public isRegistered(path: string, verb: string): boolean {
        return this.entries.has(registryKey(path, verb));
    }

    public clear(): void {
        const count = this.entries.size;
        this.entries.clear();
        logger.info({ count }, 'Endpoint security registry cleared');
    }

    /**
     * Snapshot of all entries keyed by "VERB path".
     */
    public listAll(): ReadonlyMap<string, RegisteredRule> {
        return new Map(this.entries);
    }

    public get size(): number {
        return this.entries.size;
    }
}
