/**
 * Bound an order's fills by its owner's spendable balances.
 *
 * When the fee is paid in the sell token, sell fill and fee draw on the same
 * balance, so the fill is capped at spendable * amountS / (amountS + feeAmount).
 * Otherwise the fee token balance caps the fill at
 * spendableFee * amountS / feeAmount. Buy and fee fills follow the sell fill
 * at the order's own ratios.
 */

import type { RingOrder } from "../types/order.js";

export interface SpendableAmounts {
  tokenS: bigint;
  feeToken: bigint;
}

function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function feePaidInSellToken(order: RingOrder): boolean {
  return order.feeToken.toLowerCase() === order.tokenS.toLowerCase();
}

export function scaleToSpendable(
  order: RingOrder,
  spendable: SpendableAmounts
): void {
  let fillAmountS = min(order.amountS, spendable.tokenS);

  if (order.feeAmount > 0n) {
    const fee = (order.feeAmount * fillAmountS) / order.amountS;
    if (feePaidInSellToken(order)) {
      if (fillAmountS + fee > spendable.tokenS) {
        fillAmountS =
          (spendable.tokenS * order.amountS) / (order.amountS + order.feeAmount);
      }
    } else if (fee > spendable.feeToken) {
      fillAmountS = min(
        fillAmountS,
        (spendable.feeToken * order.amountS) / order.feeAmount
      );
    }
  }

  order.fillAmountS = fillAmountS;
  order.fillAmountB = (fillAmountS * order.amountB) / order.amountS;
  order.fillAmountFee = (order.feeAmount * fillAmountS) / order.amountS;
}
