import type { ValidationError } from './types.js';

/**
 * Thrown when a header cannot be written: the model breaks the grammar, or
 * the existing block cannot be replaced safely.
 */
export class HeaderFormatError extends Error {
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[] = []) {
    super(message);
    this.name = 'HeaderFormatError';
    this.errors = errors;
  }
}

/** The scan root does not exist or is not a directory */
export class ScanRootError extends Error {
  public readonly root: string;

  constructor(root: string, message: string) {
    super(message);
    this.name = 'ScanRootError';
    this.root = root;
  }
}
