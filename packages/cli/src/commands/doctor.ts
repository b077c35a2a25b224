/**
 * tokenpilot doctor — runtime health checks
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createRuntime } from '@tokenpilot/runtime';
import { resolveConfig } from '../options.js';

export function registerDoctorCommand(program: Command): void {
    program
        .command('doctor')
        .description('Run runtime health checks')
        .action(async () => {
            console.log(chalk.bold('\n🩺 tokenpilot doctor\n'));

            const runtime = createRuntime(() => ({ value: null, tokensUsed: 0 }), { config: resolveConfig() });
            const results = await runtime.checkHealth();

            for (const status of results.values()) {
                const icon = status.healthy ? chalk.green('✅') : chalk.red('❌');
                console.log(`  ${icon} ${status.component.padEnd(20)} ${chalk.dim(status.message)}`);
            }

            const report = runtime.getStatus().health;
            const healthy = report?.overallHealthy ?? true;
            console.log(`\n  ${chalk.bold('Overall:')} ${healthy ? '🟢 healthy' : '🔴 unhealthy'}\n`);

            await runtime.shutdown();
        });
}
