/**
 * tokenpilot strategies — strategy catalogue + backtracking decisions
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { InvalidConfigError, StrategyEngine, isStrategyCategory, type StrategyCategory } from '@tokenpilot/core';
import { resolveConfig } from '../options.js';

export function registerStrategiesCommand(program: Command): void {
    program
        .command('strategies [category]')
        .description('List strategies (search|navigation|interaction) and when backtracking kicks in')
        .action((category?: string) => {
            const config = resolveConfig();
            const engine = new StrategyEngine(config.backtrackThreshold);

            let categories: StrategyCategory[] = engine.getCategories();
            if (category !== undefined) {
                if (!isStrategyCategory(category)) {
                    throw new InvalidConfigError([`unknown category "${category}" (expected ${categories.join('|')})`]);
                }
                categories = [category];
            }

            for (const name of categories) {
                console.log(chalk.bold(`\n🧩 ${name}\n`));
                engine.getStrategies(name).forEach((strategy, i) => {
                    console.log(`  ${chalk.dim(String(i + 1).padStart(2))}. ${strategy}`);
                });
            }

            console.log(chalk.bold(`\n↩️  Backtracking (threshold ${engine.maxAttemptsBeforeBacktrack})\n`));
            for (let attempts = 1; attempts <= 5; attempts++) {
                const backtrack = engine.shouldBacktrack(attempts);
                console.log(`  ${chalk.dim(`${attempts} attempt${attempts === 1 ? '' : 's'}`.padEnd(12))} ${backtrack ? chalk.yellow('backtrack') : chalk.green('continue')}`);
            }
            console.log();
        });
}
