/**
 * Raised when the persisted application index cannot be read. Starting from an
 * empty index instead would forget prior applications, so callers must stop
 * and have an operator look at the file.
 */
export class StorageCorruptionError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Application index at ${path} is unreadable: ${message}`, options);
    this.name = 'StorageCorruptionError';
    this.path = path;
  }
}

export class InvalidWeightsError extends Error {
  readonly weights: Record<string, number>;
  readonly sum: number;

  constructor(weights: Record<string, number>, reason: string) {
    const sum = Object.values(weights).reduce((acc, w) => acc + w, 0);
    super(`Invalid match weights (sum ${sum.toFixed(4)}): ${reason}`);
    this.name = 'InvalidWeightsError';
    this.weights = weights;
    this.sum = sum;
  }
}

export class RecordNotFoundError extends Error {
  readonly recordId: string;

  constructor(recordId: string) {
    super(`No application record with id "${recordId}"`);
    this.name = 'RecordNotFoundError';
    this.recordId = recordId;
  }
}

export class InputValidationError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid input in ${source}: ${message}`);
    this.name = 'InputValidationError';
    this.source = source;
  }
}
