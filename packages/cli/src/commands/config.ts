/**
 * tokenpilot config — resolved configuration (defaults + .env + AGENT_*)
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { configToRecord } from '@tokenpilot/core';
import { resolveConfig } from '../options.js';

export function registerConfigCommand(program: Command): void {
    program
        .command('config')
        .description('Show the resolved configuration')
        .action(() => {
            const record = configToRecord(resolveConfig());

            console.log(chalk.bold('\n⚙️  Configuration\n'));
            for (const [key, value] of Object.entries(record)) {
                console.log(`  ${chalk.dim(key.padEnd(24))} ${String(value)}`);
            }
            console.log();
        });
}
