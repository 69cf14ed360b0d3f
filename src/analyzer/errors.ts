/**
 * Raised when the input cannot be parsed at all. Fatal: the run produces no
 * report.
 */
export class MalformedSourceError extends Error {
  readonly line: number;
  readonly column: number;
  readonly detail: string;

  constructor(detail: string, line: number, column: number) {
    super(`line ${line}, column ${column}: ${detail}`);
    this.name = 'MalformedSourceError';
    this.detail = detail;
    this.line = line;
    this.column = column;
  }
}

/** Raised for unreadable or invalid configuration files */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A body that uses a construct the analyzer cannot score precisely.
 * Non-fatal: the entity falls back to baseline complexity.
 */
export interface UnsupportedConstructWarning {
  kind: 'UnsupportedConstructWarning';
  entity: string;
  construct: string;
  line: number;
  message: string;
}

export function unsupportedConstruct(
  entity: string,
  construct: string,
  line: number
): UnsupportedConstructWarning {
  return {
    kind: 'UnsupportedConstructWarning',
    entity,
    construct,
    line,
    message: `${entity}: unsupported construct '${construct}' at line ${line}, complexity reset to baseline`,
  };
}
