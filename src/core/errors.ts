/**
 * Fatal input errors
 *
 * Problems with a prediction never throw; they are scored. These cover
 * inputs a run cannot proceed without.
 */

export class GoldMalformationError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'GoldMalformationError';
  }
}

export class PredictionFormatError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'PredictionFormatError';
  }
}
