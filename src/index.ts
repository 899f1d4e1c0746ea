export { Ring } from "./engine/ring.js";
export { computeRingHash } from "./engine/ringHash.js";
export { allOrdersValid, collectSellTokens } from "./engine/validity.js";
export { fitRing, resize, ringRate, prevIndex, nextIndex } from "./engine/fitter.js";
export {
  planTransfers,
  assertFitInvariants,
  assertValidWalletSplit,
  serializeTransfers,
} from "./engine/transfers.js";
export { scaleToSpendable, type SpendableAmounts } from "./engine/spendable.js";
export { OnChainTokenRegistry } from "./chain/tokenRegistry.js";
export { OnChainSpendableScaler } from "./chain/spendable.js";
export { parseRingProposal } from "./proposal/parser.js";
export { loadConfig } from "./config.js";
export { createLogger, type Logger } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export {
  SettlementError,
  UnsettleableRingError,
  InvariantViolationError,
  BadParameterError,
  type SettlementErrorCode,
} from "./utils/errors.js";
export { createRingOrder, type RingOrder, type RingOrderParams } from "./types/order.js";
export type {
  TransferItem,
  SpendableScaler,
  TokenRegistry,
  SettlementContext,
  RingProposal,
} from "./types/ring.js";
export type { SettlerConfig } from "./types/config.js";
