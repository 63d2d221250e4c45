import { logger } from '../logging/logger.js';

type Env = NodeJS.ProcessEnv;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

const TRUTHY = new Set(['true', '1', 'yes']);

function numeric(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    return Number(raw);
}

/**
 * Mandatory gateway configuration.
 * Checked before the container or the session is touched.
 */
export const GATEWAY_CONFIG_REQUIREMENTS: GuardRule[] = [
    { type: 'required', name: 'IB_GATEWAY_USERNAME', sensitive: true },
    { type: 'required', name: 'IB_GATEWAY_PASSWORD', sensitive: true },
    {
        type: 'forbidIf',
        name: 'LIVE_TRADING_OPT_IN',
        when: env => env['IB_GATEWAY_TRADING_MODE'] === 'live' && !TRUTHY.has(env['GATEWAY_ALLOW_LIVE'] ?? ''),
        message: 'Live trading mode requires GATEWAY_ALLOW_LIVE=true'
    },
    {
        type: 'assert',
        check: env => numeric(env, 'RECOVERY_BACKOFF_CAP_MS', 30_000) >= numeric(env, 'RECOVERY_BACKOFF_BASE_MS', 1_000),
        message: 'RECOVERY_BACKOFF_CAP_MS must not be lower than RECOVERY_BACKOFF_BASE_MS'
    },
    {
        type: 'assert',
        check: env => numeric(env, 'HEALTH_DEBOUNCE_SAMPLES', 2) >= 1,
        message: 'HEALTH_DEBOUNCE_SAMPLES must be at least 1'
    }
];

/**
 * Fail-closed configuration guard.
 * Missing values and unsafe combinations stop the process before boot.
 */
export class ConfigGuard {
    static check(rules: GuardRule[], env: Env = process.env): string[] {
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
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        return errors;
    }

    static enforce(rules: GuardRule[], env: Env = process.env): void {
        const errors = ConfigGuard.check(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check gateway environment variables."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
