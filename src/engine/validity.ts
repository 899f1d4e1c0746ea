import type { RingOrder } from "../types/order.js";

/**
 * AND of every order's own validity flag. Each order is inspected even after
 * an invalid one is found.
 */
export function allOrdersValid(orders: readonly RingOrder[]): boolean {
  let valid = true;
  for (const order of orders) {
    valid = valid && order.valid;
  }
  return valid;
}

/**
 * Sell tokens of the ring in ring order, as passed to the token registry.
 */
export function collectSellTokens(orders: readonly RingOrder[]): string[] {
  return orders.map((order) => order.tokenS);
}
