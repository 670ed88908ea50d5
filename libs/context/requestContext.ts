import { AsyncLocalStorage } from 'node:async_hooks';
import type { ExecutionContext } from "./executionContext.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary (context middleware) calls run().
 * Downstream code calls get() or find().
 */

const storage = new AsyncLocalStorage<ExecutionContext>();

export class RequestContext {
    /**
     * Establish the execution scope for a request lifecycle.
     */
    public static run<T>(
        context: ExecutionContext,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze(context), fn);
    }

    /**
     * Current execution context. Throws if called outside run().
     */
    public static get(): ExecutionContext {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error("MISSING_REQUEST_CONTEXT: No execution scope established");
        }
        return ctx;
    }

    /**
     * Current execution context, or null outside run().
     */
    public static find(): ExecutionContext | null {
        return storage.getStore() ?? null;
    }
}
