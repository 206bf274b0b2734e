#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { FileSettingsStore } from './db/settings-store.js';
import { DEFAULT_SETTINGS_PATH } from './types.js';
import {
  EmptyCandidateSetError,
  PromptInterruptedError,
  SettingsIOError,
  SettingsParseError,
  errorMessage,
} from './errors.js';
import { EnquirerPrompter } from './commands/prompter.js';
import { pickCommand } from './commands/pick.js';
import { listCommand } from './commands/list.js';
import { addCommand } from './commands/add.js';

const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

// Report an error at the top level and pick the exit code
function fail(error: unknown): never {
  if (error instanceof PromptInterruptedError) {
    console.log(chalk.gray('\n  Interrupted\n'));
    process.exit(EXIT_INTERRUPTED);
  }
  if (error instanceof SettingsParseError) {
    console.error(chalk.red(`Error: Couldn't read settings: ${error.message}`));
  } else if (error instanceof SettingsIOError) {
    console.error(chalk.red(`Error: ${error.message}`));
  } else if (error instanceof EmptyCandidateSetError) {
    console.error(chalk.red(`Error: ${error.message}`));
    console.error(chalk.gray('  Add persons with "nominate add <name>" or exclude fewer.'));
  } else {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
  }
  process.exit(EXIT_FAILURE);
}

const program = new Command();

program
  .name('nominate')
  .description('Propose persons at random, favouring those passed over or turned down')
  .version('1.0.0');

program
  .command('pick', { isDefault: true })
  .description('Propose persons one at a time until interrupted')
  .argument('[settings]', 'Settings file (JSON or YAML)', DEFAULT_SETTINGS_PATH)
  .option('-1, --once', 'Stop after the first accepted proposal')
  .action(async (settingsPath: string, options: { once?: boolean }) => {
    const store = new FileSettingsStore(settingsPath);
    try {
      const summary = await pickCommand(store, new EnquirerPrompter(), { once: options.once });
      if (summary.failedSaves > 0) {
        console.error(chalk.yellow(`\n  ${summary.failedSaves} save(s) failed during this run`));
        process.exitCode = EXIT_FAILURE;
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('list')
  .description('Show persons with their counters and current odds')
  .argument('[settings]', 'Settings file (JSON or YAML)', DEFAULT_SETTINGS_PATH)
  .action((settingsPath: string) => {
    try {
      listCommand(new FileSettingsStore(settingsPath));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('add <names...>')
  .description('Add persons with fresh counters')
  .option('-s, --settings <path>', 'Settings file (JSON or YAML)', DEFAULT_SETTINGS_PATH)
  .action((names: string[], options: { settings: string }) => {
    try {
      const added = addCommand(new FileSettingsStore(options.settings), names);
      if (added.length === 0) {
        process.exitCode = EXIT_FAILURE;
      }
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
