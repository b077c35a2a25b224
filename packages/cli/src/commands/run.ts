/**
 * tokenpilot run / report — replay a JSON plan
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { loadPlan, runPlan, type PlanTaskResult } from '../plan.js';
import { parsePositiveInt, resolveConfig } from '../options.js';

interface PlanOptions {
    budget?: number;
}

function printTask(result: PlanTaskResult): void {
    const icon = result.error ? chalk.red('❌') : chalk.green('✅');
    const strategies = result.strategies.length > 0 ? chalk.dim(` [${result.strategies.join(' → ')}]`) : '';
    console.log(`  ${icon} ${chalk.dim(result.id.padEnd(8))} ${result.content} ${chalk.dim(`(${result.tokens} tokens)`)}${strategies}`);
}

async function replay(file: string, opts: PlanOptions) {
    const config = resolveConfig(opts.budget !== undefined ? { tokenBudget: opts.budget } : {});
    const plan = await loadPlan(file);
    return runPlan(plan, config);
}

export function registerRunCommand(program: Command): void {
    program
        .command('run <plan>')
        .description('Replay a JSON task plan and print every task')
        .option('-b, --budget <tokens>', 'Token budget', parsePositiveInt)
        .action(async (file: string, opts: PlanOptions) => {
            const { runtime, results } = await replay(file, opts);

            console.log(chalk.bold('\n🧭 Plan\n'));
            for (const result of results) printTask(result);

            const status = runtime.getStatus();
            const levelColor = status.budget.status === 'OK' ? chalk.green
                : status.budget.status === 'WARNING' ? chalk.yellow
                    : chalk.red;
            console.log(`\n  ${chalk.dim('Budget')}  ${levelColor(status.budget.status)} ${(status.budget.usageRatio * 100).toFixed(1)}% used`);
            if (status.shouldOptimizeOutput) console.log(`  ${chalk.yellow('Output should be optimized')}`);

            console.log(`\n${runtime.generateReport()}\n`);
        });

    program
        .command('report <plan>')
        .description('Replay a JSON task plan and print only the execution report')
        .option('-b, --budget <tokens>', 'Token budget', parsePositiveInt)
        .action(async (file: string, opts: PlanOptions) => {
            const { runtime } = await replay(file, opts);
            console.log(runtime.generateReport());
        });
}
