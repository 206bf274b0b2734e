export type SettingsOperation = 'read' | 'write' | 'replace';

// Settings file is not a valid document or a person lacks a required field
export class SettingsParseError extends Error {
  readonly field: string | null;
  readonly personIndex: number | null;

  constructor(
    message: string,
    options: { field?: string; personIndex?: number; filePath?: string; cause?: unknown } = {},
  ) {
    super(options.filePath ? `${options.filePath}: ${message}` : message, {
      cause: options.cause,
    });
    this.name = 'SettingsParseError';
    this.field = options.field ?? null;
    this.personIndex = options.personIndex ?? null;
  }
}

// Reading, writing or replacing the settings file failed
export class SettingsIOError extends Error {
  readonly operation: SettingsOperation;
  readonly filePath: string;

  constructor(operation: SettingsOperation, filePath: string, cause: unknown) {
    super(`Could not ${operation} ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'SettingsIOError';
    this.operation = operation;
    this.filePath = filePath;
  }
}

export class EmptyCandidateSetError extends Error {
  constructor(message: string = 'No active persons left to propose') {
    super(message);
    this.name = 'EmptyCandidateSetError';
  }
}

// User cancelled a prompt (Ctrl+C) or input ended
export class PromptInterruptedError extends Error {
  constructor(cause?: unknown) {
    super('Prompt interrupted', { cause });
    this.name = 'PromptInterruptedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
