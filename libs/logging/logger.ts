import pino from "pino";
import type { ExecutionContext } from "../context/executionContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "lattice"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with execution context identifiers attached.
 */
export function getContextLogger(context: ExecutionContext) {
  return logger.child({
    identityId: context.identityId,
    tenantId: context.tenantId,
    contractId: context.contractId ?? null,
    productId: context.productId ?? null
  });
}
