/**
 * Ledger maintenance
 *
 * Pure edits for the participant set, the instrument list and the expense
 * records. Every operation returns a new ledger and leaves its input intact.
 *
 * Rules:
 * - participant and instrument names are trimmed and must be unique
 * - changing the participant set re-normalizes every record's allocations
 * - renaming an instrument follows through to the records that use it
 * - removing an instrument keeps its name on historical records (rate 0)
 *
 * Invalid edits throw LedgerValidationError (RecordNotFoundError for ids).
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { LEDGER_CONFIG } from '@cashsplit/shared';
import type {
  AllocationShares,
  ExpenseDraftDefaults,
  ExpenseRecord,
  Instrument,
  Ledger,
  Participant,
  SplitPreview,
} from '@cashsplit/shared';
import { LedgerValidationError, RecordNotFoundError } from '../../core/errors';
import { normalizeAllocations } from '../calculations/allocation-normalizer';
import {
  buildInstrumentRateMap,
  computeCashback,
  computeSplitBase,
} from '../calculations/ledger-aggregator';
import { todayIsoDate, tryParseIsoDate } from '../calendar/calendar-date';

const instrumentSchema = z.object({
  name: z.string().trim().min(1, 'Instrument name is required'),
  cashbackRate: z
    .number()
    .finite()
    .min(0, 'Rate must be between 0 and 1')
    .max(1, 'Rate must be between 0 and 1'),
});

const expenseDraftSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    date: z
      .string()
      .trim()
      .refine((value) => tryParseIsoDate(value) !== null, { message: 'Date must be YYYY-MM-DD' }),
    payer: z.string().trim().min(1, 'Please select a payer'),
    instrument: z.string().trim().default(''),
    merchant: z.string().trim().default(''),
    item: z.string().trim().default(''),
    amount: z.number().finite().nonnegative('Amount must be a non-negative number'),
    allocations: z.record(z.number()).default({}),
    notes: z.string().trim().default(''),
  })
  .refine((draft) => draft.merchant.length > 0 || draft.item.length > 0, {
    message: 'Please fill merchant or item',
  });

export type ExpenseDraft = z.input<typeof expenseDraftSchema>;

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new LedgerValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

function renormalizeRecords(
  records: readonly ExpenseRecord[],
  participants: readonly Participant[],
  removed?: Participant
): ExpenseRecord[] {
  return records.map((record) => {
    const raw: AllocationShares = { ...record.allocations };
    if (removed !== undefined) {
      delete raw[removed];
    }
    return { ...record, allocations: normalizeAllocations(raw, participants) };
  });
}

// ==================== Participants ====================

export function addParticipant(ledger: Ledger, name: string): Ledger {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new LedgerValidationError('Participant name is required');
  }
  if (ledger.participants.includes(trimmed)) {
    throw new LedgerValidationError(`Participant already exists: ${trimmed}`);
  }

  const participants = [...ledger.participants, trimmed];
  return {
    ...ledger,
    participants,
    records: renormalizeRecords(ledger.records, participants),
  };
}

export function removeParticipant(ledger: Ledger, name: string): Ledger {
  if (!ledger.participants.includes(name)) {
    throw new LedgerValidationError(`Unknown participant: ${name}`);
  }

  const participants = ledger.participants.filter((participant) => participant !== name);
  return {
    ...ledger,
    participants,
    records: renormalizeRecords(ledger.records, participants, name),
  };
}

// ==================== Instruments ====================

export function addInstrument(ledger: Ledger, input: Instrument): Ledger {
  const instrument = parseWith(instrumentSchema, input);
  if (ledger.instruments.some((existing) => existing.name === instrument.name)) {
    throw new LedgerValidationError(`Instrument name already exists: ${instrument.name}`);
  }
  return { ...ledger, instruments: [...ledger.instruments, instrument] };
}

/**
 * Update an instrument's name and rate. Records using the old name follow a
 * rename.
 */
export function updateInstrument(ledger: Ledger, currentName: string, input: Instrument): Ledger {
  const index = ledger.instruments.findIndex((existing) => existing.name === currentName);
  if (index === -1) {
    throw new LedgerValidationError(`Unknown instrument: ${currentName}`);
  }

  const instrument = parseWith(instrumentSchema, input);
  const clashes = ledger.instruments.some(
    (existing, existingIndex) => existingIndex !== index && existing.name === instrument.name
  );
  if (clashes) {
    throw new LedgerValidationError(`Instrument name already exists: ${instrument.name}`);
  }

  const instruments = ledger.instruments.map((existing, existingIndex) =>
    existingIndex === index ? instrument : existing
  );
  const records =
    instrument.name === currentName
      ? ledger.records
      : ledger.records.map((record) =>
          record.instrument === currentName ? { ...record, instrument: instrument.name } : record
        );

  return { ...ledger, instruments, records };
}

export function removeInstrument(ledger: Ledger, name: string): Ledger {
  if (!ledger.instruments.some((existing) => existing.name === name)) {
    throw new LedgerValidationError(`Unknown instrument: ${name}`);
  }
  return {
    ...ledger,
    instruments: ledger.instruments.filter((existing) => existing.name !== name),
  };
}

// ==================== Expense records ====================

/**
 * Validate a draft and build the record it describes (not yet added)
 *
 * Allocations are normalized against the ledger's participants and `item`
 * falls back to `merchant`.
 */
export function createExpenseRecord(ledger: Ledger, draft: ExpenseDraft): ExpenseRecord {
  const parsed = parseWith(expenseDraftSchema, draft);

  return {
    id: parsed.id ?? randomUUID(),
    date: parsed.date,
    payer: parsed.payer,
    instrument: parsed.instrument,
    merchant: parsed.merchant,
    item: parsed.item || parsed.merchant,
    amount: parsed.amount,
    allocations: normalizeAllocations(parsed.allocations, ledger.participants),
    notes: parsed.notes,
  };
}

export function addExpenseRecord(ledger: Ledger, record: ExpenseRecord): Ledger {
  if (ledger.records.some((existing) => existing.id === record.id)) {
    throw new LedgerValidationError(`Expense record id already exists: ${record.id}`);
  }
  return { ...ledger, records: [...ledger.records, record] };
}

/**
 * Replace the record with the same id
 */
export function updateExpenseRecord(ledger: Ledger, record: ExpenseRecord): Ledger {
  if (!ledger.records.some((existing) => existing.id === record.id)) {
    throw new RecordNotFoundError(record.id);
  }
  return {
    ...ledger,
    records: ledger.records.map((existing) => (existing.id === record.id ? record : existing)),
  };
}

export function removeExpenseRecord(ledger: Ledger, recordId: string): Ledger {
  if (!ledger.records.some((existing) => existing.id === recordId)) {
    throw new RecordNotFoundError(recordId);
  }
  return { ...ledger, records: ledger.records.filter((existing) => existing.id !== recordId) };
}

/**
 * Cashback and split base for an amount charged on an instrument
 */
export function previewExpenseSplit(
  ledger: Ledger,
  amount: number,
  instrumentName: string
): SplitPreview {
  const rate = buildInstrumentRateMap(ledger.instruments).get(instrumentName) ?? 0;
  return {
    rate,
    cashback: computeCashback(amount, rate),
    splitBase: computeSplitBase(amount, rate, ledger.applyCashbackAsDiscount),
  };
}

// ==================== Draft defaults ====================

/**
 * Defaults for a new draft: the last saved values, else fallbacks
 * (today, first participant, first instrument, no merchant)
 */
export function resolveDraftDefaults(
  ledger: Ledger,
  last: ExpenseDraftDefaults = {},
  today: string = todayIsoDate()
): Required<ExpenseDraftDefaults> {
  const firstInstrument = ledger.instruments[0]?.name ?? LEDGER_CONFIG.FALLBACK_INSTRUMENT.name;
  return {
    date: last.date || today,
    payer: last.payer || (ledger.participants[0] ?? ''),
    instrument: last.instrument || firstInstrument,
    merchant: last.merchant || '',
  };
}

/**
 * Values to carry into the next draft once a record has been saved
 */
export function rememberDraftDefaults(record: ExpenseRecord): ExpenseDraftDefaults {
  return {
    date: record.date,
    payer: record.payer,
    instrument: record.instrument,
    merchant: record.merchant,
  };
}
