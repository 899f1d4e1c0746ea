/**
 * Order as it takes part in a ring.
 *
 * Nominal amounts (amountS, amountB, feeAmount) define the order's price and
 * never change. The fill fields are rewritten in place by spendable scaling
 * and by the resize pass, so an order must belong to one ring at a time.
 */
export interface RingOrder {
  readonly hash: string; // 0x-prefixed 32-byte order hash
  readonly owner: string;
  readonly tokenS: string;
  readonly tokenB: string;
  readonly feeToken: string;
  readonly walletAddr?: string;
  readonly amountS: bigint;
  readonly amountB: bigint;
  readonly feeAmount: bigint;

  fillAmountS: bigint;
  fillAmountB: bigint;
  fillAmountFee: bigint;
  splitS: bigint; // surplus sell amount routed to the fee holder
  valid: boolean;
}

export interface RingOrderParams {
  hash: string;
  owner: string;
  tokenS: string;
  tokenB: string;
  feeToken: string;
  walletAddr?: string;
  amountS: bigint;
  amountB: bigint;
  feeAmount: bigint;
  valid?: boolean;
}

/**
 * Build a RingOrder whose fill fields start at the nominal amounts.
 */
export function createRingOrder(params: RingOrderParams): RingOrder {
  return {
    hash: params.hash,
    owner: params.owner,
    tokenS: params.tokenS,
    tokenB: params.tokenB,
    feeToken: params.feeToken,
    walletAddr: params.walletAddr,
    amountS: params.amountS,
    amountB: params.amountB,
    feeAmount: params.feeAmount,
    fillAmountS: params.amountS,
    fillAmountB: params.amountB,
    fillAmountFee: params.feeAmount,
    splitS: 0n,
    valid: params.valid ?? true,
  };
}
