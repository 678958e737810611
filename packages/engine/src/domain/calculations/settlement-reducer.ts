/**
 * Settlement reduction
 *
 * Turns net balances into point-to-point transfers that discharge them.
 *
 * Algorithm (greedy two-pointer matching):
 * 1. Split participants into creditors (net > eps) and debtors (net < -eps)
 * 2. Sort both lists by amount, largest first (stable on input order)
 * 3. Repeatedly match the largest remaining debtor with the largest remaining
 *    creditor for min(debt, credit), advancing whichever side is exhausted
 *
 * Each step exhausts at least one side, so the loop runs at most
 * |debtors| + |creditors| - 1 times. This is a heuristic; it does not search
 * for the minimum number of transfers.
 */

import { LEDGER_CONFIG } from '@cashsplit/shared';
import type { Participant, Transfer } from '@cashsplit/shared';

interface Position {
  participant: Participant;
  amount: number;
}

/**
 * Generate settlement transfers for net balances
 *
 * Positive balances are owed money, negative balances owe money. Balances
 * within `eps` of zero take no part in the settlement.
 */
export function settleBalances(
  net: ReadonlyMap<Participant, number>,
  eps: number = LEDGER_CONFIG.SETTLEMENT_EPSILON
): Transfer[] {
  const creditors: Position[] = [];
  const debtors: Position[] = [];

  net.forEach((balance, participant) => {
    if (balance > eps) {
      creditors.push({ participant, amount: balance });
    } else if (balance < -eps) {
      debtors.push({ participant, amount: -balance });
    }
  });

  // Array.prototype.sort is stable, ties keep input order
  creditors.sort((a, b) => b.amount - a.amount);
  debtors.sort((a, b) => b.amount - a.amount);

  const transfers: Transfer[] = [];
  let debtorIndex = 0;
  let creditorIndex = 0;

  while (debtorIndex < debtors.length && creditorIndex < creditors.length) {
    const debtor = debtors[debtorIndex];
    const creditor = creditors[creditorIndex];
    if (!debtor || !creditor) break;

    const amount = Math.min(debtor.amount, creditor.amount);
    if (amount > eps) {
      transfers.push({ debtor: debtor.participant, creditor: creditor.participant, amount });
    }

    debtor.amount -= amount;
    creditor.amount -= amount;

    if (debtor.amount <= eps) {
      debtorIndex++;
    }
    if (creditor.amount <= eps) {
      creditorIndex++;
    }
  }

  return transfers;
}

/**
 * Get the total amount moved by a list of transfers
 */
export function getTotalTransferAmount(transfers: readonly Transfer[]): number {
  return transfers.reduce((sum, transfer) => sum + transfer.amount, 0);
}

/**
 * Balances after every transfer has been paid
 *
 * A debtor paying raises their balance; a creditor receiving lowers theirs.
 */
export function applyTransfers(
  net: ReadonlyMap<Participant, number>,
  transfers: readonly Transfer[]
): Map<Participant, number> {
  const remaining = new Map(net);
  for (const transfer of transfers) {
    remaining.set(transfer.debtor, (remaining.get(transfer.debtor) ?? 0) + transfer.amount);
    remaining.set(transfer.creditor, (remaining.get(transfer.creditor) ?? 0) - transfer.amount);
  }
  return remaining;
}

/**
 * Check if every balance is within `eps` of zero
 */
export function isSettled(
  net: ReadonlyMap<Participant, number>,
  eps: number = LEDGER_CONFIG.SETTLEMENT_EPSILON
): boolean {
  return Array.from(net.values()).every((balance) => Math.abs(balance) <= eps);
}
