/**
 * Ledger data types (participants, payment instruments, expense records)
 */

/**
 * Opaque participant name. Unique within a ledger; order matters only for
 * display and fallback defaults.
 */
export type Participant = string;

/**
 * Raw, unnormalized consumption shares keyed by participant name.
 * May omit participants, reference removed ones, or not sum to 1.
 */
export type AllocationShares = Record<Participant, number>;

export interface Instrument {
  name: string; // Unique within a ledger
  cashbackRate: number; // Fraction in [0, 1] returned to the payer
}

export interface ExpenseRecord {
  id: string;
  date: string; // YYYY-MM-DD
  payer: Participant;
  instrument: string; // Instrument name, may no longer exist in the ledger
  merchant: string;
  item: string;
  amount: number; // Original amount charged, non-negative
  allocations: AllocationShares;
  notes: string;
}

export interface Ledger {
  version: number;
  participants: Participant[];
  instruments: Instrument[];
  records: ExpenseRecord[];
  applyCashbackAsDiscount: boolean; // If true, split base = amount * (1 - rate)
}

/**
 * Editing session state carried between two record drafts
 * (the values the previous record was saved with)
 */
export interface ExpenseDraftDefaults {
  date?: string;
  payer?: Participant;
  instrument?: string;
  merchant?: string;
}
