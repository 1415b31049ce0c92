import { LedgerError } from './errors.js';

/**
 * Per-instance lock held for the whole of a mutating call. A nested mutating
 * call on the same owner (e.g. from an asset transfer hook) is rejected; other
 * owners have their own guard and are unaffected.
 */
export class ReentrancyGuard {
  private activeOperation: string | null = null;

  constructor(private readonly owner: string) {}

  run<T>(operation: string, fn: () => T): T {
    if (this.activeOperation !== null) {
      throw new LedgerError(
        'ReentrantCall',
        `${operation} called on ${this.owner} while ${this.activeOperation} is in progress`,
        { owner: this.owner, operation, activeOperation: this.activeOperation }
      );
    }

    this.activeOperation = operation;
    try {
      return fn();
    } finally {
      this.activeOperation = null;
    }
  }
}
