import chalk from 'chalk';
import { SettingsStore } from '../db/settings-store.js';
import { createPerson } from '../types.js';

// Append persons with zeroed counters. Returns the names actually added.
export function addCommand(store: SettingsStore, names: string[]): string[] {
  const settings = store.load();
  const existing = new Set(settings.persons.map((p) => p.name));
  const added: string[] = [];

  for (const raw of names) {
    const name = raw.trim();
    if (name === '') {
      console.error(chalk.red('  Skipping empty name'));
      continue;
    }
    if (existing.has(name)) {
      console.error(chalk.yellow(`  ${name} is already in ${store.location}`));
      continue;
    }
    settings.persons.push(createPerson(name));
    existing.add(name);
    added.push(name);
  }

  if (added.length === 0) {
    return added;
  }

  store.save(settings);
  for (const name of added) {
    console.log(chalk.green(`  + ${chalk.cyan(name)}`));
  }
  return added;
}
