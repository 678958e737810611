/**
 * Derived summary and settlement types
 */

import type { Participant } from './ledger';

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

/**
 * Inclusive date window. A missing bound is open.
 */
export interface DateWindow {
  start?: CalendarDate;
  end?: CalendarDate;
}

export interface SummaryEntry {
  paid: number;
  consumed: number;
  net: number; // paid - consumed. Positive = owed money, Negative = owes money
  cashback: number;
  netAfterCashback: number; // net + cashback
}

export interface Transfer {
  debtor: Participant; // Who pays
  creditor: Participant; // Who receives
  amount: number;
}

export interface SplitPreview {
  rate: number;
  cashback: number;
  splitBase: number;
}

export interface LedgerDrift {
  staleRecordPayers: Array<{ recordId: string; payer: Participant }>;
  unknownRecordInstruments: Array<{ recordId: string; instrument: string }>;
  staleAllocationKeys: Array<{ recordId: string; participant: Participant }>;
}
