import { Person, Settings } from '../types.js';

// State for one run: the loaded settings plus which persons were excluded at startup.
// Exclusion is not persisted.
export interface Session {
  settings: Settings;
  excluded: Set<number>; // 0-based indices into settings.persons
}

export function createSession(settings: Settings): Session {
  return { settings, excluded: new Set() };
}

export function excludePersons(session: Session, indices: number[]): void {
  for (const index of indices) {
    if (index < 0 || index >= session.settings.persons.length) {
      throw new RangeError(`No person at index ${index}`);
    }
    session.excluded.add(index);
  }
}

export function isActive(session: Session, person: Person): boolean {
  const index = session.settings.persons.indexOf(person);
  return index !== -1 && !session.excluded.has(index);
}

export function activePersons(session: Session): Person[] {
  return session.settings.persons.filter((_, i) => !session.excluded.has(i));
}

// Apply an accept/reject decision for the proposed person.
// Every other active person was passed over this cycle.
export function recordDecision(session: Session, proposed: Person, accepted: boolean): void {
  if (!isActive(session, proposed)) {
    throw new Error(`${proposed.name} is not an active person in this session`);
  }

  for (const person of activePersons(session)) {
    if (person === proposed) {
      if (accepted) {
        person.timesUnproposed = 0;
        person.timesRejected = 0;
      } else {
        person.timesRejected += 1;
      }
    } else {
      person.timesUnproposed += 1;
    }
  }
}
