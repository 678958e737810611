import { describe, it, expect } from 'vitest';
import type { ExpenseRecord, Ledger, SummaryEntry } from '@cashsplit/shared';
import {
  summarizeLedger,
  getNetBalances,
  buildInstrumentRateMap,
  computeSplitBase,
  computeCashback,
} from './ledger-aggregator';
import { parseIsoDate } from '../calendar/calendar-date';

function makeRecord(overrides: Partial<ExpenseRecord> & Pick<ExpenseRecord, 'id'>): ExpenseRecord {
  return {
    date: '2024-01-01',
    payer: 'A',
    instrument: 'Plain',
    merchant: 'Shop',
    item: 'Item',
    amount: 0,
    allocations: {},
    notes: '',
    ...overrides,
  };
}

function makeLedger(overrides: Partial<Ledger> = {}): Ledger {
  return {
    version: 1,
    participants: ['A', 'B', 'C'],
    instruments: [
      { name: 'Gold', cashbackRate: 0.05 },
      { name: 'Plain', cashbackRate: 0 },
    ],
    records: [],
    applyCashbackAsDiscount: false,
    ...overrides,
  };
}

function expectEntry(entry: SummaryEntry | undefined, expected: SummaryEntry): void {
  expect(entry).toBeDefined();
  expect(entry?.paid).toBeCloseTo(expected.paid, 9);
  expect(entry?.consumed).toBeCloseTo(expected.consumed, 9);
  expect(entry?.net).toBeCloseTo(expected.net, 9);
  expect(entry?.cashback).toBeCloseTo(expected.cashback, 9);
  expect(entry?.netAfterCashback).toBeCloseTo(expected.netAfterCashback, 9);
}

function sumNet(summary: Map<string, SummaryEntry>): number {
  return Array.from(summary.values()).reduce((sum, entry) => sum + entry.net, 0);
}

describe('Ledger Aggregator', () => {
  const tripRecords = [
    makeRecord({
      id: 'r1',
      date: '2024-01-10',
      payer: 'A',
      instrument: 'Gold',
      amount: 60,
      allocations: { A: 1, B: 1, C: 1 },
    }),
    makeRecord({
      id: 'r2',
      date: '2024-02-05',
      payer: 'B',
      instrument: 'Plain',
      amount: 30,
      allocations: { B: 2, C: 1 },
    }),
    makeRecord({
      id: 'r3',
      date: '2024-03-01',
      payer: 'C',
      instrument: 'Lost card',
      amount: 90,
      allocations: {},
    }),
  ];

  describe('summarizeLedger', () => {
    it('should split the discounted base and credit cashback to the payer', () => {
      const ledger = makeLedger({
        participants: ['A', 'B'],
        instruments: [{ name: 'Rewards', cashbackRate: 0.2 }],
        applyCashbackAsDiscount: true,
        records: [
          makeRecord({ id: 'r1', payer: 'A', instrument: 'Rewards', amount: 100, allocations: { A: 1, B: 1 } }),
        ],
      });

      const summary = summarizeLedger(ledger);

      expectEntry(summary.get('A'), { paid: 100, consumed: 40, net: 60, cashback: 20, netAfterCashback: 80 });
      expectEntry(summary.get('B'), { paid: 0, consumed: 40, net: -40, cashback: 0, netAfterCashback: -40 });
    });

    it('should split the full amount when cashback is tracked separately', () => {
      const ledger = makeLedger({
        participants: ['A', 'B'],
        instruments: [{ name: 'Rewards', cashbackRate: 0.2 }],
        applyCashbackAsDiscount: false,
        records: [
          makeRecord({ id: 'r1', payer: 'A', instrument: 'Rewards', amount: 100, allocations: { A: 1, B: 1 } }),
        ],
      });

      const summary = summarizeLedger(ledger);

      expectEntry(summary.get('A'), { paid: 100, consumed: 50, net: 50, cashback: 20, netAfterCashback: 70 });
      expectEntry(summary.get('B'), { paid: 0, consumed: 50, net: -50, cashback: 0, netAfterCashback: -50 });
    });

    it('should aggregate several records', () => {
      const summary = summarizeLedger(makeLedger({ records: tripRecords }));

      expectEntry(summary.get('A'), { paid: 60, consumed: 50, net: 10, cashback: 3, netAfterCashback: 13 });
      expectEntry(summary.get('B'), { paid: 30, consumed: 70, net: -40, cashback: 0, netAfterCashback: -40 });
      expectEntry(summary.get('C'), { paid: 90, consumed: 60, net: 30, cashback: 0, netAfterCashback: 30 });
    });

    it('should only count records inside the date window', () => {
      const window = { start: parseIsoDate('2024-01-10'), end: parseIsoDate('2024-02-28') };

      const summary = summarizeLedger(makeLedger({ records: tripRecords }), window);

      expectEntry(summary.get('A'), { paid: 60, consumed: 20, net: 40, cashback: 3, netAfterCashback: 43 });
      expectEntry(summary.get('B'), { paid: 30, consumed: 40, net: -10, cashback: 0, netAfterCashback: -10 });
      expectEntry(summary.get('C'), { paid: 0, consumed: 30, net: -30, cashback: 0, netAfterCashback: -30 });
    });

    it('should return zero totals when no record falls in the window', () => {
      const window = { start: parseIsoDate('2030-01-01') };

      const summary = summarizeLedger(makeLedger({ records: tripRecords }), window);

      for (const participant of ['A', 'B', 'C']) {
        expectEntry(summary.get(participant), { paid: 0, consumed: 0, net: 0, cashback: 0, netAfterCashback: 0 });
      }
    });

    it('should use a rate of zero for an unknown instrument', () => {
      const ledger = makeLedger({
        participants: ['A', 'B'],
        applyCashbackAsDiscount: true,
        records: [makeRecord({ id: 'r1', payer: 'B', instrument: 'Removed card', amount: 40, allocations: { A: 1 } })],
      });

      const summary = summarizeLedger(ledger);

      expectEntry(summary.get('A'), { paid: 0, consumed: 40, net: -40, cashback: 0, netAfterCashback: -40 });
      expectEntry(summary.get('B'), { paid: 40, consumed: 0, net: 40, cashback: 0, netAfterCashback: 40 });
    });

    it('should drop paid and cashback of a payer who is no longer a participant', () => {
      const ledger = makeLedger({
        participants: ['A', 'B'],
        records: [
          makeRecord({ id: 'r1', payer: 'Gone', instrument: 'Gold', amount: 50, allocations: { A: 1, Gone: 1 } }),
        ],
      });

      const summary = summarizeLedger(ledger);

      expect(summary.has('Gone')).toBe(false);
      expectEntry(summary.get('A'), { paid: 0, consumed: 50, net: -50, cashback: 0, netAfterCashback: -50 });
      expectEntry(summary.get('B'), { paid: 0, consumed: 0, net: 0, cashback: 0, netAfterCashback: 0 });
    });

    it('should split evenly when every allocated participant was removed', () => {
      const ledger = makeLedger({
        participants: ['A', 'B'],
        records: [makeRecord({ id: 'r1', payer: 'A', amount: 10, allocations: { Gone: 3 } })],
      });

      const summary = summarizeLedger(ledger);

      expectEntry(summary.get('A'), { paid: 10, consumed: 5, net: 5, cashback: 0, netAfterCashback: 5 });
      expectEntry(summary.get('B'), { paid: 0, consumed: 5, net: -5, cashback: 0, netAfterCashback: -5 });
    });

    it('should return an empty summary for an empty participant set', () => {
      const summary = summarizeLedger(makeLedger({ participants: [], records: tripRecords }));

      expect(summary.size).toBe(0);
    });

    it('should return zero totals for a ledger without records', () => {
      const summary = summarizeLedger(makeLedger());

      expect(Array.from(summary.keys())).toEqual(['A', 'B', 'C']);
      expect(sumNet(summary)).toBe(0);
    });

    it('should iterate in participant order', () => {
      const summary = summarizeLedger(makeLedger({ participants: ['C', 'A', 'B'], records: tripRecords }));

      expect(Array.from(summary.keys())).toEqual(['C', 'A', 'B']);
    });

    it('should treat a participant named __proto__ like any other name', () => {
      const ledger = makeLedger({
        participants: ['A', '__proto__'],
        records: [
          makeRecord({ id: 'r1', payer: 'A', amount: 100 }),
          makeRecord({ id: 'r2', payer: '__proto__', amount: 40, allocations: Object.fromEntries([['__proto__', 1]]) }),
        ],
      });

      const summary = summarizeLedger(ledger);

      expectEntry(summary.get('A'), { paid: 100, consumed: 50, net: 50, cashback: 0, netAfterCashback: 50 });
      expectEntry(summary.get('__proto__'), { paid: 40, consumed: 90, net: -50, cashback: 0, netAfterCashback: -50 });
      expect(sumNet(summary)).toBe(0);
    });

    it('should not mutate the ledger', () => {
      const ledger = makeLedger({ records: tripRecords });
      const before = JSON.stringify(ledger);

      summarizeLedger(ledger, { start: parseIsoDate('2024-02-01') });

      expect(JSON.stringify(ledger)).toBe(before);
    });
  });

  describe('conservation', () => {
    it('should keep net balances summing to zero when cashback is tracked separately', () => {
      const ledgers = [
        makeLedger({ records: tripRecords }),
        makeLedger({
          records: [
            makeRecord({ id: 'x1', payer: 'B', instrument: 'Gold', amount: 33.33, allocations: { A: 0.1, C: 0.7 } }),
            makeRecord({ id: 'x2', payer: 'C', amount: 0.01, allocations: { A: 1, B: 1, C: 1 } }),
            makeRecord({ id: 'x3', payer: 'A', amount: 1234.56, allocations: { B: -1, C: 5 } }),
          ],
        }),
      ];

      for (const ledger of ledgers) {
        expect(Math.abs(sumNet(summarizeLedger(ledger)))).toBeLessThan(1e-6);
      }
    });

    it('should keep net balances summing to zero when no instrument earns cashback', () => {
      const ledger = makeLedger({
        applyCashbackAsDiscount: true,
        instruments: [{ name: 'Plain', cashbackRate: 0 }],
        records: tripRecords,
      });

      expect(Math.abs(sumNet(summarizeLedger(ledger)))).toBeLessThan(1e-6);
    });

    it('should leave the discount with the payers when cashback reduces the split base', () => {
      const ledger = makeLedger({ applyCashbackAsDiscount: true, records: tripRecords });

      const summary = summarizeLedger(ledger);
      const totalCashback = Array.from(summary.values()).reduce((sum, entry) => sum + entry.cashback, 0);

      // Only r1 earns cashback: 60 * 0.05
      expect(totalCashback).toBeCloseTo(3, 9);
      expect(sumNet(summary)).toBeCloseTo(totalCashback, 9);
    });

    it('should partition each record split base across participants', () => {
      const ledger = makeLedger({
        applyCashbackAsDiscount: true,
        records: [makeRecord({ id: 'r1', payer: 'A', instrument: 'Gold', amount: 80, allocations: { A: 1, B: 3 } })],
      });

      const summary = summarizeLedger(ledger);
      const totalConsumed = Array.from(summary.values()).reduce((sum, entry) => sum + entry.consumed, 0);

      expect(totalConsumed).toBeCloseTo(80 * 0.95, 9);
      expect(summary.get('A')?.consumed).toBeCloseTo(19, 9);
      expect(summary.get('B')?.consumed).toBeCloseTo(57, 9);
      expect(summary.get('C')?.consumed).toBe(0);
    });
  });

  describe('helpers', () => {
    it('should build a rate lookup where later duplicates win', () => {
      const rates = buildInstrumentRateMap([
        { name: 'Gold', cashbackRate: 0.05 },
        { name: 'Gold', cashbackRate: 0.06 },
        { name: 'Plain', cashbackRate: 0 },
      ]);

      expect(rates.get('Gold')).toBe(0.06);
      expect(rates.get('Plain')).toBe(0);
      expect(rates.has('Other')).toBe(false);
    });

    it('should compute split base and cashback', () => {
      expect(computeSplitBase(200, 0.25, true)).toBe(150);
      expect(computeSplitBase(200, 0.25, false)).toBe(200);
      expect(computeCashback(200, 0.25)).toBe(50);
    });

    it('should extract net balances in summary order', () => {
      const net = getNetBalances(summarizeLedger(makeLedger({ records: tripRecords })));

      expect(Array.from(net.keys())).toEqual(['A', 'B', 'C']);
      expect(net.get('A')).toBeCloseTo(10, 9);
      expect(net.get('B')).toBeCloseTo(-40, 9);
      expect(net.get('C')).toBeCloseTo(30, 9);
    });
  });
});
