/**
 * Errors raised at the collaborator boundary (record drafts, snapshots,
 * ledger edits). The calculation engine itself never throws.
 */

export class LedgerValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerValidationError';
  }
}

export class RecordNotFoundError extends Error {
  readonly recordId: string;

  constructor(recordId: string) {
    super(`Expense record not found: ${recordId}`);
    this.name = 'RecordNotFoundError';
    this.recordId = recordId;
  }
}
