import path from 'path';
import yaml from 'js-yaml';
import { Person, Settings, DEFAULT_SETTINGS } from '../types.js';
import { SettingsParseError, errorMessage } from '../errors.js';

export type SettingsFormat = 'json' | 'yaml';

export function settingsFormatFor(filePath: string): SettingsFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFactor(
  raw: Record<string, unknown>,
  field: 'unproposedFactor' | 'rejectedFactor',
): number {
  const value = raw[field];
  if (value === undefined) return DEFAULT_SETTINGS[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SettingsParseError(`${field} must be a number`, { field });
  }
  return Math.max(0, value);
}

function readCounter(
  raw: Record<string, unknown>,
  field: 'timesUnproposed' | 'timesRejected',
  personIndex: number,
): number {
  const value = raw[field];
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new SettingsParseError(`Person ${personIndex + 1}: ${field} must be an integer`, {
      field,
      personIndex,
    });
  }
  return Math.max(0, value);
}

function readPerson(raw: unknown, index: number): Person {
  if (!isRecord(raw)) {
    throw new SettingsParseError(`Person ${index + 1} must be an object`, { personIndex: index });
  }
  if (raw.name === undefined) {
    throw new SettingsParseError(`Person ${index + 1} must have a name`, {
      field: 'name',
      personIndex: index,
    });
  }
  if (typeof raw.name !== 'string') {
    throw new SettingsParseError(`Person ${index + 1}: name must be a string`, {
      field: 'name',
      personIndex: index,
    });
  }
  return {
    name: raw.name,
    timesUnproposed: readCounter(raw, 'timesUnproposed', index),
    timesRejected: readCounter(raw, 'timesRejected', index),
  };
}

// Validate a decoded document and fill in defaults
export function parseSettings(raw: unknown): Settings {
  if (!isRecord(raw)) {
    throw new SettingsParseError('Settings must be an object');
  }

  const persons = raw.persons ?? [];
  if (!Array.isArray(persons)) {
    throw new SettingsParseError('persons must be an array', { field: 'persons' });
  }

  return {
    unproposedFactor: readFactor(raw, 'unproposedFactor'),
    rejectedFactor: readFactor(raw, 'rejectedFactor'),
    persons: persons.map((p: unknown, i) => readPerson(p, i)),
  };
}

export function decodeSettings(content: string, format: SettingsFormat): Settings {
  let raw: unknown;
  try {
    // Core schema keeps dates and other YAML-only types as plain strings
    raw =
      format === 'yaml'
        ? yaml.load(content, { schema: yaml.CORE_SCHEMA })
        : JSON.parse(content);
  } catch (error) {
    throw new SettingsParseError(`Invalid ${format.toUpperCase()}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  // An empty YAML document loads as undefined
  if (format === 'yaml' && (raw === undefined || raw === null)) {
    return parseSettings({});
  }
  return parseSettings(raw);
}

// Fixed key order keeps the file diffable between saves
export function encodeSettings(settings: Settings, format: SettingsFormat): string {
  const doc = {
    unproposedFactor: settings.unproposedFactor,
    rejectedFactor: settings.rejectedFactor,
    persons: settings.persons.map((p) => ({
      name: p.name,
      timesUnproposed: p.timesUnproposed,
      timesRejected: p.timesRejected,
    })),
  };
  if (format === 'yaml') {
    return yaml.dump(doc, { indent: 2, noRefs: true });
  }
  return `${JSON.stringify(doc, null, 2)}\n`;
}
