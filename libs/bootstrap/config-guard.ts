import { logger } from '../logging/logger.js';
import { REDACT_CENSOR } from '../logging/redactionConfig.js';

export type Environment = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    /** A sensitive value is masked wherever the guard reports it */
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: Environment) => boolean; message: string }
    | { type: 'assert'; check: (env: Environment) => boolean; message: string };

/**
 * Fail-closed configuration guard.
 * Every rule is checked; all violations are reported together.
 */
export class ConfigGuard {
    static collectViolations(rules: readonly GuardRule[], env: Environment = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                errors.push(`Check failed for rule: ${message}`);
            }
        }

        return errors;
    }

    /**
     * Required variables and their values as the guard reports them; null
     * when missing.
     */
    static describeRequired(rules: readonly GuardRule[], env: Environment = process.env): Record<string, string | null> {
        const described: Record<string, string | null> = {};

        for (const rule of rules) {
            if (rule.type !== 'required') continue;
            const value = env[rule.name]?.trim();
            described[rule.name] = !value ? null : rule.sensitive ? REDACT_CENSOR : value;
        }

        return described;
    }

    static enforce(rules: readonly GuardRule[], env: Environment = process.env): void {
        const errors = ConfigGuard.collectViolations(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                required: ConfigGuard.describeRequired(rules, env),
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
