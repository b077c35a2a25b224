import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SecurityValidationError } from '@tokenpilot/core';
import { SecurityValidator, redact } from '../index.js';

beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => { });
    vi.spyOn(console, 'error').mockImplementation(() => { });
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('@tokenpilot/sandbox-policy', () => {
    describe('Input Rules', () => {
        it('accepts input when there are no rules', () => {
            expect(new SecurityValidator().validateInput('anything')).toBe(true);
        });

        it('rejects on the first failing rule and counts it', () => {
            const validator = new SecurityValidator();
            const second = vi.fn(() => true);
            validator.addValidationRule((data) => typeof data === 'string', 'is_string');
            validator.addValidationRule(second);

            expect(validator.validateInput(42)).toBe(false);
            expect(second).not.toHaveBeenCalled();
            expect(validator.getSuspiciousActivityCount()).toBe(1);
        });

        it('passes input through every rule', () => {
            const validator = new SecurityValidator();
            validator.addValidationRule((data) => typeof data === 'string');
            validator.addValidationRule((data) => typeof data === 'string' && !data.includes('<script>'));
            expect(validator.validateInput('hello')).toBe(true);
            expect(validator.validateInput('<script>alert(1)</script>')).toBe(false);
            expect(validator.getSuspiciousActivityCount()).toBe(1);
        });

        it('a throwing rule fails the input without counting it', () => {
            const validator = new SecurityValidator();
            validator.addValidationRule(() => {
                throw new Error('rule bug');
            });
            expect(validator.validateInput('x')).toBe(false);
            expect(validator.getSuspiciousActivityCount()).toBe(0);
        });

        it('assertValid throws SecurityValidationError', () => {
            const validator = new SecurityValidator();
            validator.addValidationRule(() => false);
            expect(() => validator.assertValid('x')).toThrow(SecurityValidationError);
        });
    });

    describe('Redaction', () => {
        it('redacts API keys', () => {
            expect(redact('key: sk-abcdefghijklmnopqrstuvwxyz')).toBe('key: [REDACTED:API_KEY]');
        });

        it('redacts bearer tokens', () => {
            expect(redact('Authorization: Bearer test-token')).toBe('Authorization: Bearer [REDACTED:TOKEN]');
        });

        it('redacts passwords', () => {
            expect(redact('password=test-secret')).toBe('password=[REDACTED:PASSWORD]');
        });

        it('leaves clean text unchanged', () => {
            expect(redact('Found 3 products')).toBe('Found 3 products');
        });
    });

    describe('sanitizeOutput', () => {
        it('replaces every occurrence of a blocked string', () => {
            const validator = new SecurityValidator();
            validator.addBlockedPattern('internal-host');
            expect(validator.sanitizeOutput('internal-host and internal-host')).toBe('[REDACTED] and [REDACTED]');
        });

        it('supports regex patterns', () => {
            const validator = new SecurityValidator();
            validator.addBlockedPattern(/\d{3}-\d{4}/);
            expect(validator.sanitizeOutput('call 555-0100 or 555-0199')).toBe('call [REDACTED] or [REDACTED]');
        });

        it('applies built-in secret redaction after blocked patterns', () => {
            const validator = new SecurityValidator();
            validator.addBlockedPattern('acme');
            expect(validator.sanitizeOutput('acme password: test-secret')).toBe('[REDACTED] password=[REDACTED:PASSWORD]');
        });
    });

    describe('Rate Limiter', () => {
        it('allows up to limit calls per window', () => {
            let now = 0;
            const validator = new SecurityValidator({ now: () => now });
            expect(validator.checkRateLimit('search', 2, 1_000)).toBe(true);
            now = 100;
            expect(validator.checkRateLimit('search', 2, 1_000)).toBe(true);
            now = 200;
            expect(validator.checkRateLimit('search', 2, 1_000)).toBe(false);
        });

        it('frees capacity as the window slides', () => {
            let now = 0;
            const validator = new SecurityValidator({ now: () => now });
            validator.checkRateLimit('search', 1, 1_000);
            now = 999;
            expect(validator.checkRateLimit('search', 1, 1_000)).toBe(false);
            now = 1_000;
            expect(validator.checkRateLimit('search', 1, 1_000)).toBe(true);
        });

        it('tracks actions independently', () => {
            const validator = new SecurityValidator({ now: () => 0 });
            expect(validator.checkRateLimit('search', 1, 1_000)).toBe(true);
            expect(validator.checkRateLimit('click', 1, 1_000)).toBe(true);
            expect(validator.checkRateLimit('search', 1, 1_000)).toBe(false);
        });
    });
});
