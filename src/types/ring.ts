import type { Logger } from "../utils/logger.js";
import type { RingOrder } from "./order.js";

/**
 * A single token movement produced by transfer planning.
 */
export interface TransferItem {
  readonly token: string;
  readonly from: string;
  readonly to: string;
  readonly amount: bigint;
}

/**
 * Bounds an order's fill fields by what its owner can actually fund.
 * Implementations update the order in place.
 */
export interface SpendableScaler {
  scaleBySpendableAmount(order: RingOrder): Promise<void>;
}

export interface TokenRegistry {
  areAllTokensRegistered(tokens: string[]): Promise<boolean>;
}

/**
 * Services a ring needs from its surroundings.
 */
export interface SettlementContext {
  orderScaler: SpendableScaler;
  tokenRegistry: TokenRegistry;
  feeHolder: string;
  logger: Logger;
}

/**
 * Serialized ring proposal as read from JSON input.
 */
export interface RingProposal {
  owner: string;
  feeRecipient: string;
  orders: RingOrder[];
}
