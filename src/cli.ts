#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { randomUUID } from 'node:crypto';
import chalk from 'chalk';

import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { CommandDeps, createCommandDeps } from './commands/deps.js';
import { runAccept } from './commands/accept.js';
import { CreateOptions, runCreate } from './commands/create.js';
import { runDecompose } from './commands/decompose.js';
import { runDescribe } from './commands/describe.js';
import { runEstimate } from './commands/estimate.js';
import { runReview } from './commands/review.js';
import { ReviewQueueFilters } from './tracker/jql.js';

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive whole number.');
    }
    return parsed;
}

/**
 * Build the dependencies for one command run and release the terminal afterwards.
 */
async function withDeps(run: (deps: CommandDeps) => Promise<unknown>): Promise<void> {
    // --config-dir is read from argv by loadConfig; commander only documents it
    const config = loadConfig();
    const logger = createLogger(randomUUID(), {
        level: config.logLevel,
        json: config.logLevel === 'debug',
    });
    const deps = await createCommandDeps(config, logger);
    try {
        await run(deps);
    } finally {
        deps.terminal.close();
    }
}

const program = new Command();

program
    .name('ticketwright')
    .description('Interactive assistant for writing, splitting and estimating issue-tracker tickets')
    .version('0.1.0')
    .option('--config-dir <dir>', 'Configuration directory (default: ~/.ticketwright)');

program
    .command('describe')
    .description('Generate or update a ticket description through a short Q&A')
    .argument('<ticket>', 'Ticket key, e.g. ENG-123 (a bare number uses the default project)')
    .action(async (ticket: string) => {
        await withDeps(deps => runDescribe(deps, ticket));
    });

program
    .command('create')
    .description('Create a ticket; "create spike <words>" creates a SPIKE ticket')
    .argument('<summary...>', 'Ticket summary')
    .option('-p, --project <key>', 'Project key (default: default_project)')
    .option('-t, --type <type>', 'Issue type (default: default_task_type)')
    .option('--parent <ticket>', 'Parent ticket key; skips the recent-parents menu')
    .action(async (summary: string[], options: CreateOptions) => {
        await withDeps(deps => runCreate(deps, summary, options));
    });

program
    .command('decompose')
    .description('Split a ticket into child tickets no larger than a story point limit')
    .argument('<ticket>', 'Parent ticket key')
    .option('--max-points <n>', 'Maximum story points per child ticket', parsePositiveInt)
    .action(async (ticket: string, options: { maxPoints?: number }) => {
        await withDeps(deps => runDecompose(deps, ticket, { maxPoints: options.maxPoints }));
    });

program
    .command('accept')
    .description('Close a research ticket and turn its findings into an epic with tasks')
    .argument('<ticket>', 'Research ticket key')
    .action(async (ticket: string) => {
        await withDeps(deps => runAccept(deps, ticket));
    });

program
    .command('estimate')
    .description('Estimate story points; without keys, pick from unestimated tickets')
    .argument('[tickets...]', 'Ticket keys')
    .action(async (tickets: string[]) => {
        await withDeps(deps => runEstimate(deps, tickets));
    });

program
    .command('review')
    .description('Review a ticket, or pick tickets from the review queue, filling in description and story points')
    .argument('[ticket]', 'Ticket key; without one, tickets are listed from the default project')
    .option('--needs-detail', 'Only tickets in "To Do"')
    .option('--unassigned', 'Only tickets without an assignee')
    .option('--untriaged', 'Only tickets without a priority')
    .action(async (ticket: string | undefined, options: ReviewQueueFilters) => {
        await withDeps(deps => runReview(deps, ticket, options));
    });

try {
    await program.parseAsync();
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Error: ${message}`));
    process.exit(1);
}
