/**
 * Shared option parsing for tokenpilot commands
 */

import { InvalidArgumentError } from 'commander';
import { loadConfigFromEnv, setLogLevel, type AgentConfig, type AgentConfigInput } from '@tokenpilot/core';

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
    }
    return parsed;
}

export function parseNonNegativeInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
    }
    return parsed;
}

/** Env (AGENT_*) + CLI overrides; applies the log level as a side effect */
export function resolveConfig(overrides: AgentConfigInput = {}, env: NodeJS.ProcessEnv = process.env): Readonly<AgentConfig> {
    const config = loadConfigFromEnv(env, overrides);
    setLogLevel(config.logLevel);
    return config;
}
