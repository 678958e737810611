/**
 * Ledger snapshots exchanged with the persistence collaborator
 *
 * A snapshot is the plain-object form of a ledger as it is stored
 * (`people`, `cards`, `expenses`, snake_case flags). This module validates
 * it on the way in and maps it back on the way out; reading and writing
 * files stays with the caller.
 */

import { z } from 'zod';
import { LEDGER_CONFIG } from '@cashsplit/shared';
import type { Instrument, Ledger, LedgerDrift, Participant } from '@cashsplit/shared';
import { LedgerValidationError } from '../../core/errors';
import type { EngineConfig } from '../../config';

const cardSnapshotSchema = z.object({
  name: z.string(),
  cashback_rate: z.number(),
});

const expenseSnapshotSchema = z.object({
  id: z.string(),
  date: z.string(),
  payer: z.string(),
  card: z.string(),
  merchant: z.string(),
  item: z.string(),
  amount: z.number(),
  allocations: z.record(z.number()),
  notes: z.string().default(''),
});

export const ledgerSnapshotSchema = z.object({
  version: z.number().int().default(LEDGER_CONFIG.LEDGER_VERSION),
  people: z.array(z.string()).default([]),
  apply_cashback_as_discount: z.boolean().default(LEDGER_CONFIG.DEFAULT_APPLY_CASHBACK_AS_DISCOUNT),
  cards: z.array(cardSnapshotSchema).default([]),
  expenses: z.array(expenseSnapshotSchema).default([]),
});

export type LedgerSnapshot = z.output<typeof ledgerSnapshotSchema>;

/**
 * Validate a snapshot and convert it to a ledger
 */
export function parseLedgerSnapshot(input: unknown): Ledger {
  const parsed = ledgerSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new LedgerValidationError(`Invalid ledger snapshot: ${parsed.error.message}`);
  }

  const snapshot = parsed.data;
  return {
    version: snapshot.version,
    participants: [...snapshot.people],
    instruments: snapshot.cards.map((card) => ({
      name: card.name,
      cashbackRate: card.cashback_rate,
    })),
    records: snapshot.expenses.map((expense) => ({
      id: expense.id,
      date: expense.date,
      payer: expense.payer,
      instrument: expense.card,
      merchant: expense.merchant,
      item: expense.item,
      amount: expense.amount,
      allocations: { ...expense.allocations },
      notes: expense.notes,
    })),
    applyCashbackAsDiscount: snapshot.apply_cashback_as_discount,
  };
}

/**
 * Convert a ledger to its snapshot form
 */
export function toLedgerSnapshot(ledger: Ledger): LedgerSnapshot {
  return {
    version: ledger.version,
    people: [...ledger.participants],
    apply_cashback_as_discount: ledger.applyCashbackAsDiscount,
    cards: ledger.instruments.map((instrument) => ({
      name: instrument.name,
      cashback_rate: instrument.cashbackRate,
    })),
    expenses: ledger.records.map((record) => ({
      id: record.id,
      date: record.date,
      payer: record.payer,
      card: record.instrument,
      merchant: record.merchant,
      item: record.item,
      amount: record.amount,
      allocations: { ...record.allocations },
      notes: record.notes,
    })),
  };
}

/**
 * Empty ledger seeded from configuration
 */
export function createDefaultLedger(
  config: Pick<EngineConfig, 'defaultParticipants' | 'applyCashbackAsDiscount'>,
  instruments: readonly Instrument[] = []
): Ledger {
  return {
    version: LEDGER_CONFIG.LEDGER_VERSION,
    participants: [...config.defaultParticipants],
    instruments:
      instruments.length > 0 ? [...instruments] : [{ ...LEDGER_CONFIG.FALLBACK_INSTRUMENT }],
    records: [],
    applyCashbackAsDiscount: config.applyCashbackAsDiscount,
  };
}

/**
 * List references that no longer resolve against the ledger
 *
 * The aggregator tolerates all of these silently; this makes them visible.
 */
export function findLedgerDrift(ledger: Ledger): LedgerDrift {
  const participants = new Set<Participant>(ledger.participants);
  const instruments = new Set(ledger.instruments.map((instrument) => instrument.name));
  const drift: LedgerDrift = {
    staleRecordPayers: [],
    unknownRecordInstruments: [],
    staleAllocationKeys: [],
  };

  for (const record of ledger.records) {
    if (!participants.has(record.payer)) {
      drift.staleRecordPayers.push({ recordId: record.id, payer: record.payer });
    }
    if (!instruments.has(record.instrument)) {
      drift.unknownRecordInstruments.push({ recordId: record.id, instrument: record.instrument });
    }
    for (const participant of Object.keys(record.allocations)) {
      if (!participants.has(participant)) {
        drift.staleAllocationKeys.push({ recordId: record.id, participant });
      }
    }
  }

  return drift;
}

export function hasLedgerDrift(drift: LedgerDrift): boolean {
  return (
    drift.staleRecordPayers.length > 0 ||
    drift.unknownRecordInstruments.length > 0 ||
    drift.staleAllocationKeys.length > 0
  );
}
