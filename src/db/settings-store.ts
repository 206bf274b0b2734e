import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { Settings, DEFAULT_SETTINGS, cloneSettings } from '../types.js';
import {
  SettingsIOError,
  SettingsParseError,
  errorMessage,
  isErrnoException,
} from '../errors.js';
import { decodeSettings, encodeSettings, settingsFormatFor } from './settings-codec.js';

const MAX_TEMP_ATTEMPTS = 100;

// Missing file means first run: start from defaults
export function loadSettings(filePath: string): Settings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return cloneSettings(DEFAULT_SETTINGS);
    }
    throw new SettingsIOError('read', filePath, error);
  }

  try {
    return decodeSettings(content, settingsFormatFor(filePath));
  } catch (error) {
    if (error instanceof SettingsParseError) {
      throw new SettingsParseError(error.message, {
        field: error.field ?? undefined,
        personIndex: error.personIndex ?? undefined,
        filePath,
        cause: error,
      });
    }
    throw error;
  }
}

// Follow symlinks so the rename replaces the file they point to, and keep its permissions
function resolveTarget(filePath: string): { target: string; mode: number | null } {
  let target: string;
  try {
    target = fs.realpathSync(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { target: filePath, mode: null };
    }
    throw new SettingsIOError('write', filePath, error);
  }

  try {
    return { target, mode: fs.statSync(target).mode & 0o777 };
  } catch (error) {
    throw new SettingsIOError('write', filePath, error);
  }
}

// Exclusive create in the target's directory so the final rename stays on one volume
function openTempFile(target: string, filePath: string): { tmpPath: string; fd: number } {
  const dir = path.dirname(target);
  const base = path.basename(target);

  for (let n = 0; n < MAX_TEMP_ATTEMPTS; n++) {
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${n}.tmp`);
    try {
      return { tmpPath, fd: fs.openSync(tmpPath, 'wx') };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') continue;
      throw new SettingsIOError('write', filePath, error);
    }
  }
  throw new SettingsIOError(
    'write',
    filePath,
    new Error(`No free temporary file name after ${MAX_TEMP_ATTEMPTS} attempts`),
  );
}

function discardTempFile(tmpPath: string): void {
  try {
    fs.rmSync(tmpPath, { force: true });
  } catch (error) {
    console.error(chalk.gray(`  Could not remove ${tmpPath}: ${errorMessage(error)}`));
  }
}

// Write to a temp file, fsync, then rename over the target.
// Readers see either the old file or the new one, never a partial write.
// A symlinked path keeps its link; the file it points to is replaced.
export function saveSettings(filePath: string, settings: Settings): void {
  const content = encodeSettings(settings, settingsFormatFor(filePath));
  const { target, mode } = resolveTarget(filePath);
  const { tmpPath, fd } = openTempFile(target, filePath);

  try {
    try {
      if (mode !== null) {
        fs.fchmodSync(fd, mode);
      }
      fs.writeFileSync(fd, content, 'utf8');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  } catch (error) {
    discardTempFile(tmpPath);
    throw new SettingsIOError('write', filePath, error);
  }

  try {
    fs.renameSync(tmpPath, target);
  } catch (error) {
    discardTempFile(tmpPath);
    throw new SettingsIOError('replace', filePath, error);
  }
}

export interface SettingsStore {
  readonly location: string;
  load(): Settings;
  save(settings: Settings): void;
}

// File-based store for production
export class FileSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  load(): Settings {
    return loadSettings(this.filePath);
  }

  save(settings: Settings): void {
    saveSettings(this.filePath, settings);
  }
}

// In-memory store for testing
export class InMemorySettingsStore implements SettingsStore {
  readonly location = '<memory>';
  readonly saved: Settings[] = [];
  failSaves = false;
  private settings: Settings;

  constructor(settings: Settings = DEFAULT_SETTINGS) {
    this.settings = cloneSettings(settings);
  }

  load(): Settings {
    return cloneSettings(this.settings);
  }

  save(settings: Settings): void {
    if (this.failSaves) {
      throw new SettingsIOError('write', this.location, new Error('simulated failure'));
    }
    this.settings = cloneSettings(settings);
    this.saved.push(cloneSettings(settings));
  }

  // Latest persisted state
  current(): Settings {
    return cloneSettings(this.settings);
  }
}
