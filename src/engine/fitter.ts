/**
 * Fill fitting for a ring of orders.
 *
 * Algorithm:
 * - Backward pass (i = N-1 .. 0): whenever the predecessor wants more than
 *   order i sells, shrink the predecessor to order i's sell amount at the
 *   predecessor's own price. Remember the last index that caused a shrink.
 * - Second backward pass (i = N-1 .. smallest) to carry a late shrink back
 *   over the part of the ring visited before it.
 * - Forward pass: each order must sell at least what its predecessor buys.
 *   Any excess becomes splitS and the sell fill is clamped to the exact need.
 *
 * Rounding: BigInt division truncates, so amounts can only shrink.
 */

import type { RingOrder } from "../types/order.js";
import { BadParameterError, UnsettleableRingError } from "../utils/errors.js";

export function prevIndex(i: number, ringSize: number): number {
  return (i + ringSize - 1) % ringSize;
}

export function nextIndex(i: number, ringSize: number): number {
  return (i + 1) % ringSize;
}

/**
 * Shrink the predecessor of order i when it asks for more than order i sells.
 * Returns i if a shrink happened, otherwise the previous smallest.
 */
export function resize(
  orders: readonly RingOrder[],
  i: number,
  smallest: number
): number {
  const order = orders[i];
  const prevOrder = orders[prevIndex(i, orders.length)];

  if (prevOrder.fillAmountB <= order.fillAmountS) return smallest;

  prevOrder.fillAmountB = order.fillAmountS;
  prevOrder.fillAmountS =
    (prevOrder.fillAmountB * prevOrder.amountS) / prevOrder.amountB;
  prevOrder.fillAmountFee =
    (prevOrder.feeAmount * prevOrder.fillAmountS) / prevOrder.amountS;
  return i;
}

/**
 * Product of the ring's order prices. Only used for diagnostics.
 */
export function ringRate(orders: readonly RingOrder[]): number {
  let rate = 1;
  for (const order of orders) {
    rate = (rate * Number(order.amountS)) / Number(order.amountB);
  }
  return rate;
}

/**
 * Fit every order's fill amounts so that each edge of the ring balances.
 * Throws UnsettleableRingError if some edge still cannot be covered.
 */
export function fitRing(orders: readonly RingOrder[]): void {
  const ringSize = orders.length;

  orders.forEach((order, i) => {
    if (order.amountS <= 0n || order.amountB <= 0n) {
      throw new BadParameterError(
        `order ${i}: amountS and amountB must be positive`
      );
    }
  });

  let smallest = 0;
  for (let i = ringSize - 1; i >= 0; i--) {
    smallest = resize(orders, i, smallest);
  }

  for (let i = ringSize - 1; i >= smallest; i--) {
    resize(orders, i, smallest);
  }

  for (let i = 0; i < ringSize; i++) {
    const current = orders[i];
    const next = orders[nextIndex(i, ringSize)];

    if (next.fillAmountS < current.fillAmountB) {
      throw new UnsettleableRingError(i, current.fillAmountB, next.fillAmountS);
    }
    next.splitS = next.fillAmountS - current.fillAmountB;
    next.fillAmountS = current.fillAmountB;
  }
}
