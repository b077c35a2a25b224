/**
 * tokenpilot budget — classify a usage against the configured thresholds
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { TokenBudget } from '@tokenpilot/core';
import { parseNonNegativeInt, parsePositiveInt, resolveConfig } from '../options.js';

export function registerBudgetCommand(program: Command): void {
    program
        .command('budget')
        .description('Classify token usage (OK / WARNING / CRITICAL)')
        .requiredOption('-t, --total <tokens>', 'Total budget', parsePositiveInt)
        .requiredOption('-u, --used <tokens>', 'Tokens used', parseNonNegativeInt)
        .action((opts: { total: number; used: number }) => {
            const config = resolveConfig({ tokenBudget: opts.total });
            const budget = new TokenBudget(config.tokenBudget, {
                warningThreshold: config.warningThreshold,
                criticalThreshold: config.criticalThreshold,
                overrunPolicy: 'clamp',
            });
            const update = budget.update(opts.used);
            const status = budget.getStatus();

            const color = status.status === 'OK' ? chalk.green
                : status.status === 'WARNING' ? chalk.yellow
                    : chalk.red;

            console.log(chalk.bold('\n💰 Token Budget\n'));
            console.log(`  ${chalk.dim('Status'.padEnd(12))} ${color(status.status)}`);
            console.log(`  ${chalk.dim('Used'.padEnd(12))} ${status.used} / ${status.total} (${(status.usageRatio * 100).toFixed(1)}%)`);
            console.log(`  ${chalk.dim('Remaining'.padEnd(12))} ${status.remaining}`);
            if (update.overBudget) {
                console.log(`  ${chalk.red('Over budget by')} ${update.overflow}`);
            }
            console.log();
        });
}
