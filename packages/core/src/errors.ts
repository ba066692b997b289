// Error types shared by every stage of the deck build

export class KotobaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KotobaError';
  }
}

/**
 * Input that violates a hard precondition, such as a word with no kana reading.
 */
export class InvalidInputError extends KotobaError {
  constructor(public field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'InvalidInputError';
  }
}

/**
 * Malformed or unreadable source data: unknown JLPT tiers, broken CSV or
 * dictionary files.
 */
export class DataError extends KotobaError {
  constructor(message: string, public source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'DataError';
  }
}
