/**
 * Transfer planning for a fitted ring.
 *
 * Per order i (from = owner of i, to = owner of its predecessor):
 * - principal: fillAmountS of tokenS to the predecessor
 * - fee:       fillAmountFee of feeToken to the fee holder (if > 0)
 * - spread:    splitS of tokenS to the fee holder (if > 0)
 * Orders with a zero sell fill produce no transfers at all.
 */

import type { RingOrder } from "../types/order.js";
import type { TransferItem } from "../types/ring.js";
import {
  BadParameterError,
  InvariantViolationError,
} from "../utils/errors.js";
import { prevIndex } from "./fitter.js";

export function assertValidWalletSplit(walletSplitPercentage: number): void {
  if (
    !Number.isFinite(walletSplitPercentage) ||
    walletSplitPercentage < 0 ||
    walletSplitPercentage > 100
  ) {
    throw new BadParameterError(
      `invalid walletSplitPercentage: ${walletSplitPercentage}`
    );
  }
}

/**
 * Check the bounds a fitted order must satisfy before it moves any value.
 */
export function assertFitInvariants(order: RingOrder, index: number): void {
  const checks: [boolean, string][] = [
    [order.fillAmountS >= 0n, "fillAmountS >= 0"],
    [order.splitS >= 0n, "splitS >= 0"],
    [order.fillAmountFee >= 0n, "fillAmountFee >= 0"],
    [order.fillAmountS + order.splitS <= order.amountS, "fillAmountS + splitS <= amountS"],
    [order.fillAmountS <= order.amountS, "fillAmountS <= amountS"],
    [order.fillAmountFee <= order.feeAmount, "fillAmountFee <= feeAmount"],
  ];
  for (const [ok, invariant] of checks) {
    if (!ok) throw new InvariantViolationError(index, invariant);
  }
}

export function planTransfers(
  orders: readonly RingOrder[],
  feeHolder: string
): TransferItem[] {
  const ringSize = orders.length;
  const transferItems: TransferItem[] = [];

  for (let i = 0; i < ringSize; i++) {
    const order = orders[i];
    assertFitInvariants(order, i);

    if (order.fillAmountS === 0n) continue;

    const from = order.owner;
    const to = orders[prevIndex(i, ringSize)].owner;

    transferItems.push({ token: order.tokenS, from, to, amount: order.fillAmountS });
    if (order.fillAmountFee > 0n) {
      transferItems.push({
        token: order.feeToken,
        from,
        to: feeHolder,
        amount: order.fillAmountFee,
      });
    }
    if (order.splitS > 0n) {
      transferItems.push({ token: order.tokenS, from, to: feeHolder, amount: order.splitS });
    }
  }

  return transferItems;
}

/**
 * JSON rendering of a transfer list, amounts as decimal strings.
 */
export function serializeTransfers(items: readonly TransferItem[]): string {
  return JSON.stringify(
    items.map((t) => ({ ...t, amount: t.amount.toString() })),
    null,
    2
  );
}
