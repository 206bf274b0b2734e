// A person that can be proposed
export interface Person {
  name: string;
  timesUnproposed: number; // Cycles where someone else was proposed
  timesRejected: number; // Proposals turned down since the last acceptance
}

// Linear weight factors
export interface Factors {
  unproposedFactor: number;
  rejectedFactor: number;
}

// Everything persisted in the settings file
export interface Settings extends Factors {
  persons: Person[];
}

// Default settings
export const DEFAULT_SETTINGS: Settings = {
  unproposedFactor: 0.5,
  rejectedFactor: 0.2,
  persons: [],
};

export const DEFAULT_SETTINGS_PATH = 'settings.json';

export function createPerson(name: string): Person {
  return { name, timesUnproposed: 0, timesRejected: 0 };
}

// Deep copy so callers never mutate DEFAULT_SETTINGS or a stored snapshot
export function cloneSettings(settings: Settings): Settings {
  return {
    unproposedFactor: settings.unproposedFactor,
    rejectedFactor: settings.rejectedFactor,
    persons: settings.persons.map((p) => ({ ...p })),
  };
}
