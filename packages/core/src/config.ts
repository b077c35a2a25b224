/**
 * @tokenpilot/core — Config
 *
 * Zod schema with defaults + env loader.
 * Invalid values never reach the agent: everything goes through createConfig().
 */

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

export const OVERRUN_POLICIES = ['clamp', 'reject'] as const;
export type OverrunPolicy = (typeof OVERRUN_POLICIES)[number];

export const DEFAULT_TOKEN_BUDGET = 200_000;
export const DEFAULT_WARNING_THRESHOLD = 0.7;
export const DEFAULT_CRITICAL_THRESHOLD = 0.9;

export const AgentConfigSchema = z
    .object({
        tokenBudget: z.number().int().positive().default(DEFAULT_TOKEN_BUDGET),
        maxValidationErrors: z.number().int().positive().default(5),
        maxRetryAttempts: z.number().int().positive().default(5),
        backtrackThreshold: z.number().int().positive().default(3),
        warningThreshold: z.number().gt(0).lt(1).default(DEFAULT_WARNING_THRESHOLD),
        criticalThreshold: z.number().gt(0).max(1).default(DEFAULT_CRITICAL_THRESHOLD),
        overrunPolicy: z.enum(OVERRUN_POLICIES).default('clamp'),
        enableMultiStrategy: z.boolean().default(true),
        enableBacktracking: z.boolean().default(true),
        logLevel: z
            .string()
            .transform((value) => value.toUpperCase())
            .pipe(z.enum(LOG_LEVELS))
            .default('INFO'),
    })
    .refine((config) => config.warningThreshold < config.criticalThreshold, {
        message: 'warningThreshold must be below criticalThreshold',
        path: ['warningThreshold'],
    });

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

export function createConfig(input: AgentConfigInput = {}): Readonly<AgentConfig> {
    return parseConfig(input);
}

/** Validate an untyped record (env, JSON) against the schema */
export function parseConfig(input: unknown): Readonly<AgentConfig> {
    const parsed = AgentConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        );
        throw new InvalidConfigError(issues);
    }
    return Object.freeze(parsed.data);
}

/** Numeric env variables → config field */
const NUMERIC_ENV: ReadonlyArray<[string, keyof AgentConfigInput]> = [
    ['AGENT_TOKEN_BUDGET', 'tokenBudget'],
    ['AGENT_MAX_ERRORS', 'maxValidationErrors'],
    ['AGENT_MAX_RETRIES', 'maxRetryAttempts'],
    ['AGENT_BACKTRACK_THRESHOLD', 'backtrackThreshold'],
    ['AGENT_WARNING_THRESHOLD', 'warningThreshold'],
    ['AGENT_CRITICAL_THRESHOLD', 'criticalThreshold'],
];

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env, overrides: AgentConfigInput = {}): Readonly<AgentConfig> {
    const raw: Record<string, unknown> = {};

    for (const [name, field] of NUMERIC_ENV) {
        const value = env[name]?.trim();
        if (value) raw[field] = Number(value);
    }

    const logLevel = env.AGENT_LOG_LEVEL?.trim();
    if (logLevel) raw.logLevel = logLevel;

    const policy = env.AGENT_OVERRUN_POLICY?.trim();
    if (policy) raw.overrunPolicy = policy;

    return parseConfig({ ...raw, ...overrides });
}

/** snake_case view used by `tokenpilot config` */
export function configToRecord(config: AgentConfig): Record<string, string | number | boolean> {
    return {
        token_budget: config.tokenBudget,
        max_validation_errors: config.maxValidationErrors,
        max_retry_attempts: config.maxRetryAttempts,
        backtrack_threshold: config.backtrackThreshold,
        warning_threshold: config.warningThreshold,
        critical_threshold: config.criticalThreshold,
        overrun_policy: config.overrunPolicy,
        enable_multi_strategy: config.enableMultiStrategy,
        enable_backtracking: config.enableBacktracking,
        log_level: config.logLevel,
    };
}
