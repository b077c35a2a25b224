/**
 * @tokenpilot/sandbox-policy — Security Validator
 *
 * Input Rules: pluggable predicates, failures counted as suspicious activity
 * Rate Limiter: sliding window per action
 * Redaction Layer: blocked patterns + built-in secret masks on outputs
 */

import { SecurityValidationError, createLogger, errorMessage } from '@tokenpilot/core';

export type ValidationRule = (data: unknown) => boolean;

interface NamedRule {
    name: string;
    rule: ValidationRule;
}

export interface SecurityValidatorOptions {
    now?: () => number;
}

const log = createLogger('Security');

// --- Redaction Layer ---

const REDACTION_PATTERNS: [RegExp, string][] = [
    [/sk-[a-zA-Z0-9_-]{20,}/g, '[REDACTED:API_KEY]'],
    [/AKIA[0-9A-Z]{16}/g, '[REDACTED:AWS_KEY]'],
    [/gh[pousr]_[a-zA-Z0-9]{36}/g, '[REDACTED:GITHUB_TOKEN]'],
    [/Bearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED:TOKEN]'],
    [/eyJ[a-zA-Z0-9_-]+\.eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g, '[REDACTED:JWT]'],
    [/api[_-]?key\s*[:=]\s*\S+/gi, 'api_key=[REDACTED:API_KEY]'],
    [/password\s*[:=]\s*\S+/gi, 'password=[REDACTED:PASSWORD]'],
];

/** Mask well-known secret shapes */
export function redact(text: string): string {
    let result = text;
    for (const [pattern, replacement] of REDACTION_PATTERNS) {
        result = result.replace(pattern, replacement);
    }
    return result;
}

function toGlobal(pattern: RegExp): RegExp {
    return pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

// --- Validator ---

export class SecurityValidator {
    private rules: NamedRule[] = [];
    private blockedPatterns: Array<string | RegExp> = [];
    private suspiciousActivityCount = 0;
    private rateWindows: Map<string, number[]> = new Map();
    private readonly now: () => number;

    constructor(options: SecurityValidatorOptions = {}) {
        this.now = options.now ?? Date.now;
    }

    addValidationRule(rule: ValidationRule, name = `rule_${this.rules.length + 1}`): void {
        this.rules.push({ name, rule });
    }

    /** false on the first failing rule; a throwing rule also fails the input */
    validateInput(data: unknown): boolean {
        for (const { name, rule } of this.rules) {
            try {
                if (!rule(data)) {
                    this.suspiciousActivityCount++;
                    log.warn(`Validation failed: ${name}`, { suspicious: this.suspiciousActivityCount });
                    return false;
                }
            } catch (err) {
                log.error(`Validation rule "${name}" threw`, { error: errorMessage(err) });
                return false;
            }
        }
        return true;
    }

    /** validateInput, throwing SecurityValidationError instead of returning false */
    assertValid(data: unknown): void {
        if (!this.validateInput(data)) throw new SecurityValidationError();
    }

    addBlockedPattern(pattern: string | RegExp): void {
        this.blockedPatterns.push(typeof pattern === 'string' ? pattern : toGlobal(pattern));
    }

    sanitizeOutput(text: string): string {
        let result = text;
        for (const pattern of this.blockedPatterns) {
            result = typeof pattern === 'string'
                ? result.split(pattern).join('[REDACTED]')
                : result.replace(pattern, '[REDACTED]');
        }
        return redact(result);
    }

    /** At most `limit` calls per `windowMs`. A refused call is not recorded. */
    checkRateLimit(action: string, limit: number, windowMs: number): boolean {
        const now = this.now();
        const recent = (this.rateWindows.get(action) ?? []).filter((t) => t > now - windowMs);

        if (recent.length >= limit) {
            this.rateWindows.set(action, recent);
            log.warn(`Rate limit hit for "${action}"`, { limit, windowMs });
            return false;
        }

        recent.push(now);
        this.rateWindows.set(action, recent);
        return true;
    }

    getSuspiciousActivityCount(): number {
        return this.suspiciousActivityCount;
    }
}
