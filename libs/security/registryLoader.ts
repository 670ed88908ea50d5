import crypto from "crypto";
import fs from "fs";
import path from "path";
import { logger } from "../logging/logger.js";
import { validate } from "../validation/zod-middleware.js";
import { SecurityRulesFileSchema } from "../validation/securityRuleSchema.js";
import type { EndpointSecurityRegistry } from "./registry.js";
import { defineRequirement, type SecurityRequirement } from "./requirement.js";

export interface SecurityRule {
    path: string;
    verb: string;
    requirement: SecurityRequirement;
}

export interface LoadedSecurityRules {
    rules: SecurityRule[];
    /** sha256 of the file contents, for change tracking in logs */
    digest: string;
}

/**
 * Reads and validates a security rules file (JSON, version v1).
 */
export function readSecurityRules(rulesPath: string): LoadedSecurityRules {
    const absolutePath = path.resolve(process.cwd(), rulesPath);
    if (!fs.existsSync(absolutePath)) {
        throw new Error(`Security rules file missing at ${rulesPath}`);
    }

    const contents = fs.readFileSync(absolutePath, "utf-8");
    const digest = crypto.createHash("sha256").update(contents).digest("hex");

    let raw: unknown;
    try {
        raw = JSON.parse(contents);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`Security rules file ${rulesPath} is not valid JSON: ${message}`);
    }

    const parsed = validate(SecurityRulesFileSchema, raw, `SecurityRules:${rulesPath}`);

    return {
        rules: parsed.rules.map(rule => ({
            path: rule.path,
            verb: rule.verb,
            requirement: defineRequirement(rule.requirement)
        })),
        digest
    };
}

/**
 * Registers every rule from the file; later rules for the same key replace
 * earlier ones.
 */
export function loadSecurityRules(registry: EndpointSecurityRegistry, rulesPath: string): number {
    const { rules, digest } = readSecurityRules(rulesPath);

    for (const rule of rules) {
        registry.register(rule.path, rule.verb, rule.requirement);
    }

    logger.info({ rulesPath, count: rules.length, digest: digest.substring(0, 16) }, "Security rules loaded");
    return rules.length;
}
