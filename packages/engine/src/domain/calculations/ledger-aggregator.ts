/**
 * Ledger aggregation engine
 *
 * Calculates per-participant paid, consumed and cashback totals from the
 * expense records of a ledger, optionally restricted to a date window.
 *
 * Data drift is tolerated rather than rejected:
 * - an unknown instrument has a cashback rate of 0
 * - allocation keys of removed participants are ignored by normalization
 * - a payer who is no longer a participant contributes nothing to paid or
 *   cashback, while the record's consumption still splits over the current
 *   participants
 */

import type {
  DateWindow,
  ExpenseRecord,
  Instrument,
  Ledger,
  Participant,
  SummaryEntry,
} from '@cashsplit/shared';
import { getShare, normalizeAllocations } from './allocation-normalizer';
import { filterRecordsByDate } from './record-filter';

interface Totals {
  paid: number;
  consumed: number;
  cashback: number;
}

/**
 * Build a lookup of instrument name to cashback rate
 */
export function buildInstrumentRateMap(instruments: readonly Instrument[]): Map<string, number> {
  return new Map(instruments.map((instrument) => [instrument.name, instrument.cashbackRate]));
}

/**
 * Amount divided among consumers for a record
 */
export function computeSplitBase(amount: number, rate: number, applyDiscount: boolean): number {
  return applyDiscount ? amount * (1 - rate) : amount;
}

/**
 * Reward credited to the payer for a record
 */
export function computeCashback(amount: number, rate: number): number {
  return amount * rate;
}

/**
 * Cashback rate of the record's instrument, 0 when the instrument is gone
 */
export function getRecordRate(record: ExpenseRecord, rates: Map<string, number>): number {
  return rates.get(record.instrument) ?? 0;
}

/**
 * Calculate summary entries for every current participant
 *
 * The returned map iterates in participant order.
 */
export function summarizeLedger(ledger: Ledger, window: DateWindow = {}): Map<Participant, SummaryEntry> {
  const { participants } = ledger;
  const rates = buildInstrumentRateMap(ledger.instruments);

  // Initialize totals for all participants
  const totals = new Map<Participant, Totals>();
  participants.forEach((participant) => {
    totals.set(participant, { paid: 0, consumed: 0, cashback: 0 });
  });

  for (const record of filterRecordsByDate(ledger.records, window)) {
    processRecord(record, ledger, rates, totals);
  }

  const summary = new Map<Participant, SummaryEntry>();
  totals.forEach((total, participant) => {
    const net = total.paid - total.consumed;
    summary.set(participant, {
      paid: total.paid,
      consumed: total.consumed,
      net,
      cashback: total.cashback,
      netAfterCashback: net + total.cashback,
    });
  });

  return summary;
}

/**
 * Process a single expense record
 */
function processRecord(
  record: ExpenseRecord,
  ledger: Ledger,
  rates: Map<string, number>,
  totals: Map<Participant, Totals>
): void {
  const rate = getRecordRate(record, rates);
  const splitBase = computeSplitBase(record.amount, rate, ledger.applyCashbackAsDiscount);

  // Record who consumed
  const allocation = normalizeAllocations(record.allocations, ledger.participants);
  for (const [participant, total] of totals) {
    total.consumed += splitBase * getShare(allocation, participant);
  }

  // Record who paid (stale payers are dropped)
  const payerTotal = totals.get(record.payer);
  if (payerTotal) {
    payerTotal.paid += record.amount;
    payerTotal.cashback += computeCashback(record.amount, rate);
  }
}

/**
 * Extract the net balance of each participant, in summary order
 */
export function getNetBalances(summary: Map<Participant, SummaryEntry>): Map<Participant, number> {
  const net = new Map<Participant, number>();
  summary.forEach((entry, participant) => {
    net.set(participant, entry.net);
  });
  return net;
}
