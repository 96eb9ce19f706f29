export class QuizError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Thrown when a session operation is called in the wrong state,
 * e.g. answering after the last question or scoring before it.
 */
export class InvalidStateError extends QuizError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
  }
}

export class InvalidChoiceError extends QuizError {
  constructor(public readonly choice: number, public readonly optionCount: number) {
    super(`Choice ${choice} is out of range (0-${optionCount - 1})`, 'INVALID_CHOICE');
  }
}

export class CatalogError extends QuizError {
  constructor(message: string) {
    super(message, 'CATALOG');
  }
}

export class ConfigError extends QuizError {
  constructor(message: string) {
    super(message, 'CONFIG');
  }
}
