#!/usr/bin/env node
/**
 * tokenpilot — Command Line Interface
 *
 * Тонкий wrapper над runtime API. 0 бизнес-логики.
 */

import * as dotenv from 'dotenv';
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@tokenpilot/core';
import { registerRunCommand } from './commands/run.js';
import { registerConfigCommand } from './commands/config.js';
import { registerStrategiesCommand } from './commands/strategies.js';
import { registerBudgetCommand } from './commands/budget.js';
import { registerDoctorCommand } from './commands/doctor.js';

dotenv.config();

const program = new Command();

program
    .name('tokenpilot')
    .description('Token budget and task lifecycle tracking for autonomous agents')
    .version('0.1.0');

registerRunCommand(program);
registerConfigCommand(program);
registerStrategiesCommand(program);
registerBudgetCommand(program);
registerDoctorCommand(program);

program.parseAsync().catch((err: unknown) => {
    console.error(chalk.red(`✖ ${errorMessage(err)}`));
    process.exitCode = 1;
});
