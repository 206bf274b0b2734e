import chalk from 'chalk';
import { SettingsStore } from '../db/settings-store.js';
import { selectionOdds } from '../core/weight.js';

export function listCommand(store: SettingsStore): void {
  const settings = store.load();

  console.log(chalk.yellow.bold('\n  PERSONS\n'));
  console.log(
    chalk.gray(
      `  Factors: unproposed ${settings.unproposedFactor}, rejected ${settings.rejectedFactor}`,
    ),
  );
  console.log();

  if (settings.persons.length === 0) {
    console.log(chalk.gray(`  No persons yet. Use "nominate add <name>" to add some.`));
    console.log();
    return;
  }

  const width = Math.max(...settings.persons.map((p) => p.name.length));
  selectionOdds(settings.persons, settings).forEach(({ person, weight, probability }, i) => {
    const percent = `${(probability * 100).toFixed(1)}%`.padStart(6);
    console.log(
      `  ${chalk.cyan(`${i + 1}:`)} ${person.name.padEnd(width)}  ${percent}  ${chalk.gray(
        `weight ${weight.toFixed(2)}, unproposed ${person.timesUnproposed}, rejected ${person.timesRejected}`,
      )}`,
    );
  });
  console.log();
}
