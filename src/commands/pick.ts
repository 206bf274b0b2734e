import chalk from 'chalk';
import { SettingsStore } from '../db/settings-store.js';
import {
  Session,
  createSession,
  excludePersons,
  activePersons,
  recordDecision,
} from '../core/session.js';
import { parseExclusionInput } from '../core/exclusions.js';
import { proposePerson } from '../core/selector.js';
import { EmptyCandidateSetError, SettingsIOError } from '../errors.js';
import { Prompter } from './prompter.js';

export interface PickOptions {
  once?: boolean; // Stop after the first accepted proposal
  random?: () => number;
}

export interface PickSummary {
  accepted: number;
  rejected: number;
  failedSaves: number;
  lastAccepted: string | null;
}

// Trimmed, case-insensitive "y". Anything else is a rejection.
export function isAcceptance(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

async function promptExclusions(session: Session, prompter: Prompter): Promise<void> {
  const persons = session.settings.persons;
  if (persons.length === 0) return;

  console.log(chalk.yellow.bold('\n  PERSONS\n'));
  persons.forEach((person, i) => {
    console.log(`  ${chalk.cyan(`${i + 1}:`)} ${person.name}`);
  });
  console.log();

  while (true) {
    const input = await prompter.ask('Exclude (comma-separated numbers, empty for none)');
    const result = parseExclusionInput(input, persons.length);
    if (result.ok) {
      excludePersons(session, result.indices);
      return;
    }
    console.error(chalk.red(`  ${result.error}`));
  }
}

// Returns false when the save failed; the in-memory state is kept either way
function persist(store: SettingsStore, session: Session): boolean {
  try {
    store.save(session.settings);
    return true;
  } catch (error) {
    if (!(error instanceof SettingsIOError)) throw error;
    console.error(chalk.red(`  ${error.message}`));
    console.error(
      chalk.yellow(
        `  ${store.location} may be stale. Counters are kept in memory for the next save.`,
      ),
    );
    return false;
  }
}

export async function pickCommand(
  store: SettingsStore,
  prompter: Prompter,
  options: PickOptions = {},
): Promise<PickSummary> {
  const random = options.random ?? Math.random;
  const session = createSession(store.load());
  const summary: PickSummary = { accepted: 0, rejected: 0, failedSaves: 0, lastAccepted: null };

  await promptExclusions(session, prompter);

  while (true) {
    const candidates = activePersons(session);
    if (candidates.length === 0) {
      throw new EmptyCandidateSetError(
        session.settings.persons.length === 0
          ? `No persons configured in ${store.location}`
          : 'Every person is excluded',
      );
    }

    const proposed = proposePerson(candidates, session.settings, random);
    console.log();
    const answer = await prompter.ask(`Pick ${proposed.name} (y/n)?`);
    const accepted = isAcceptance(answer);

    recordDecision(session, proposed, accepted);
    if (accepted) {
      summary.accepted++;
      summary.lastAccepted = proposed.name;
      console.log(chalk.green(`  ✓ Picked ${chalk.cyan(proposed.name)}`));
    } else {
      summary.rejected++;
      console.log(chalk.gray(`  ✗ Rejected ${proposed.name}`));
    }

    if (!persist(store, session)) {
      summary.failedSaves++;
    }

    if (accepted && options.once) {
      return summary;
    }
  }
}
