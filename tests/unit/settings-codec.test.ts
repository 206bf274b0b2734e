import { describe, it, expect } from 'vitest';
import {
  parseSettings,
  decodeSettings,
  encodeSettings,
  settingsFormatFor,
} from '../../src/db/settings-codec.js';
import { SettingsParseError } from '../../src/errors.js';
import { Settings } from '../../src/types.js';

describe('settingsFormatFor', () => {
  it('chooses YAML by extension and JSON otherwise', () => {
    expect(settingsFormatFor('team.yaml')).toBe('yaml');
    expect(settingsFormatFor('dir/team.YML')).toBe('yaml');
    expect(settingsFormatFor('settings.json')).toBe('json');
    expect(settingsFormatFor('settings')).toBe('json');
  });
});

describe('parseSettings', () => {
  it('fills in defaults for an empty document', () => {
    expect(parseSettings({})).toEqual({ unproposedFactor: 0.5, rejectedFactor: 0.2, persons: [] });
  });

  it('defaults missing counters to zero', () => {
    const settings = parseSettings({ unproposedFactor: 1, persons: [{ name: 'Ada' }] });
    expect(settings).toEqual({
      unproposedFactor: 1,
      rejectedFactor: 0.2,
      persons: [{ name: 'Ada', timesUnproposed: 0, timesRejected: 0 }],
    });
  });

  it('clamps negative factors and counters to zero', () => {
    const settings = parseSettings({
      unproposedFactor: -1,
      rejectedFactor: 0.3,
      persons: [{ name: 'Ada', timesUnproposed: -2, timesRejected: 5 }],
    });
    expect(settings.unproposedFactor).toBe(0);
    expect(settings.persons[0]).toEqual({ name: 'Ada', timesUnproposed: 0, timesRejected: 5 });
  });

  it('requires an object at the root', () => {
    expect(() => parseSettings([])).toThrow('Settings must be an object');
    expect(() => parseSettings(null)).toThrow(SettingsParseError);
  });

  it('requires persons to be an array', () => {
    expect(() => parseSettings({ persons: { name: 'Ada' } })).toThrow('persons must be an array');
  });

  it('identifies a person without a name', () => {
    let caught: unknown;
    try {
      parseSettings({ persons: [{ name: 'Ada' }, { timesRejected: 1 }] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SettingsParseError);
    if (caught instanceof SettingsParseError) {
      expect(caught.message).toBe('Person 2 must have a name');
      expect(caught.field).toBe('name');
      expect(caught.personIndex).toBe(1);
    }
  });

  it('rejects wrongly typed fields', () => {
    expect(() => parseSettings({ persons: ['Ada'] })).toThrow('Person 1 must be an object');
    expect(() => parseSettings({ persons: [{ name: 42 }] })).toThrow(
      'Person 1: name must be a string',
    );
    expect(() => parseSettings({ rejectedFactor: '0.2' })).toThrow(
      'rejectedFactor must be a number',
    );
    expect(() => parseSettings({ persons: [{ name: 'Ada', timesRejected: 1.5 }] })).toThrow(
      'Person 1: timesRejected must be an integer',
    );
  });
});

describe('decodeSettings', () => {
  it('wraps JSON syntax errors', () => {
    expect(() => decodeSettings('{"persons": [', 'json')).toThrow(SettingsParseError);
    expect(() => decodeSettings('{"persons": [', 'json')).toThrow(/^Invalid JSON: /);
  });

  it('treats an empty YAML document as defaults', () => {
    expect(decodeSettings('', 'yaml')).toEqual({
      unproposedFactor: 0.5,
      rejectedFactor: 0.2,
      persons: [],
    });
  });

  it('reads date-like YAML names as strings', () => {
    const settings = decodeSettings('persons:\n  - name: 2024-01-01\n', 'yaml');
    expect(settings.persons).toEqual([
      { name: '2024-01-01', timesUnproposed: 0, timesRejected: 0 },
    ]);
  });

  it('round-trips date-like names through YAML', () => {
    const settings: Settings = {
      unproposedFactor: 0.5,
      rejectedFactor: 0.2,
      persons: [{ name: '2024-01-01', timesUnproposed: 2, timesRejected: 1 }],
    };
    expect(decodeSettings(encodeSettings(settings, 'yaml'), 'yaml')).toEqual(settings);
  });

  it('rejects an empty JSON document', () => {
    expect(() => decodeSettings('null', 'json')).toThrow('Settings must be an object');
  });
});

describe('encodeSettings', () => {
  const settings: Settings = {
    unproposedFactor: 0.5,
    rejectedFactor: 0.2,
    persons: [{ name: 'Ada', timesUnproposed: 1, timesRejected: 0 }],
  };

  it('writes JSON with a fixed key order and trailing newline', () => {
    expect(encodeSettings(settings, 'json')).toBe(
      [
        '{',
        '  "unproposedFactor": 0.5,',
        '  "rejectedFactor": 0.2,',
        '  "persons": [',
        '    {',
        '      "name": "Ada",',
        '      "timesUnproposed": 1,',
        '      "timesRejected": 0',
        '    }',
        '  ]',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('writes YAML that decodes to the same settings', () => {
    const text = encodeSettings(settings, 'yaml');
    expect(text.split('\n')[0]).toBe('unproposedFactor: 0.5');
    expect(decodeSettings(text, 'yaml')).toEqual(settings);
  });
});
