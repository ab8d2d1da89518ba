export type TrackerErrorCode =
  | 'UNKNOWN_DIALECT'
  | 'DIALECT_MISMATCH'
  | 'NO_HERO_HANDS'
  | 'POT_INVARIANT'
  | 'CONFIG';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownDialectError extends TrackerError {
  readonly fileName: string;

  constructor(fileName: string) {
    super('UNKNOWN_DIALECT', `[Dialect] No known site naming convention matches "${fileName}"`);
    this.fileName = fileName;
  }
}

export class DialectMismatchError extends TrackerError {
  readonly fileName: string;
  readonly dialect: string;

  constructor(fileName: string, dialect: string) {
    super('DIALECT_MISMATCH', `[Dialect] "${fileName}" does not contain ${dialect} hand histories`);
    this.fileName = fileName;
    this.dialect = dialect;
  }
}

export class NoHeroHandsError extends TrackerError {
  readonly hero: string;

  constructor(hero: string) {
    super('NO_HERO_HANDS', `[Session] No parsed hand includes the hero "${hero}"`);
    this.hero = hero;
  }
}

/** Raised when pot accounting does not add up; never swallowed. */
export class PotInvariantError extends TrackerError {
  readonly handId: string;

  constructor(handId: string, detail: string) {
    super('POT_INVARIANT', `[Pots] Hand ${handId}: ${detail}`);
    this.handId = handId;
  }
}

export class ConfigError extends TrackerError {
  constructor(message: string) {
    super('CONFIG', `[Config] ${message}`);
  }
}
