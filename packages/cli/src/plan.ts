/**
 * tokenpilot plan — JSON task plans replayed through an EnhancedAgent
 *
 * A plan records what each task cost and how it ended; the runner feeds those
 * numbers to the runtime so budget, reports and telemetry can be inspected offline.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { InvalidConfigError, errorMessage, type AgentConfigInput } from '@tokenpilot/core';
import { TaskFailure, createRuntime, type EnhancedAgent } from '@tokenpilot/runtime';

const PlanTaskSchema = z.object({
    content: z.string().min(1),
    activeForm: z.string().default(''),
    tokens: z.number().int().nonnegative(),
    outcome: z.enum(['completed', 'failed']),
    strategies: z.array(z.string().min(1)).default([]),
});

export const PlanSchema = z.object({
    tasks: z.array(PlanTaskSchema),
});

export type Plan = z.infer<typeof PlanSchema>;
export type PlanTask = z.infer<typeof PlanTaskSchema>;

export interface PlanTaskResult {
    id: string;
    content: string;
    outcome: PlanTask['outcome'];
    tokens: number;
    strategies: string[];
    error?: string;
}

export interface PlanRun {
    runtime: EnhancedAgent<PlanTask['outcome']>;
    results: PlanTaskResult[];
}

export function parsePlan(input: unknown): Plan {
    const parsed = PlanSchema.safeParse(input);
    if (!parsed.success) {
        throw new InvalidConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
    }
    return parsed.data;
}

export async function loadPlan(path: string): Promise<Plan> {
    const text = await readFile(path, 'utf-8');
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new InvalidConfigError([`${path}: ${errorMessage(err)}`]);
    }
    return parsePlan(raw);
}

/** Replay every task in order. Failed tasks are recorded, not thrown. */
export async function runPlan(plan: Plan, config: AgentConfigInput = {}): Promise<PlanRun> {
    const runtime = createRuntime<PlanTask['outcome']>((task, context) => {
        const item = PlanTaskSchema.parse(context);
        for (const strategy of item.strategies) task.recordStrategy(strategy);
        if (item.outcome === 'failed') {
            throw new TaskFailure(`Task "${task.id}" failed`, item.tokens);
        }
        return { value: item.outcome, tokensUsed: item.tokens };
    }, { config, enableWatchdog: false });

    const results: PlanTaskResult[] = [];
    for (const item of plan.tasks) {
        const id = `task_${runtime.agent.getTasks().length + 1}`;
        const result: PlanTaskResult = {
            id,
            content: item.content,
            outcome: item.outcome,
            tokens: item.tokens,
            strategies: item.strategies,
        };
        try {
            await runtime.executeTask(item.content, item, { activeForm: item.activeForm });
        } catch (err) {
            result.outcome = 'failed';
            result.error = errorMessage(err);
        }
        results.push(result);
    }

    await runtime.shutdown();
    return { runtime, results };
}
