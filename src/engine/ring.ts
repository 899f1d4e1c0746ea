/**
 * One settlement attempt over a cyclic sequence of orders.
 *
 * Lifecycle:
 * 1. checkOrdersValid / checkTokensRegistered narrow `valid` (never widen it)
 * 2. calculateFillAmountAndFee scales every order by its spendable amount,
 *    then fits fills around the ring
 * 3. getTransferItems turns the fitted fills into transfers
 *
 * A Ring is built fresh for each attempt and discarded afterwards.
 */

import type { RingOrder } from "../types/order.js";
import type { SettlementContext, TransferItem } from "../types/ring.js";
import type { Logger } from "../utils/logger.js";
import { UnsettleableRingError } from "../utils/errors.js";
import { computeRingHash } from "./ringHash.js";
import { allOrdersValid, collectSellTokens } from "./validity.js";
import { fitRing, ringRate } from "./fitter.js";
import { assertValidWalletSplit, planTransfers } from "./transfers.js";

export class Ring {
  readonly orders: readonly RingOrder[];
  readonly owner: string;
  readonly feeRecipient: string;
  valid: boolean;

  private context: SettlementContext;
  private logger: Logger;
  private cachedHash?: string;

  constructor(
    context: SettlementContext,
    orders: RingOrder[],
    owner: string,
    feeRecipient: string
  ) {
    this.context = context;
    this.orders = Object.freeze([...orders]);
    this.owner = owner;
    this.feeRecipient = feeRecipient;
    this.valid = true;
    this.logger = context.logger;
  }

  get size(): number {
    return this.orders.length;
  }

  get hash(): string {
    return this.cachedHash ?? this.updateHash();
  }

  updateHash(): string {
    this.cachedHash = computeRingHash(this.orders.map((o) => o.hash));
    return this.cachedHash;
  }

  checkOrdersValid(): void {
    this.valid = allOrdersValid(this.orders) && this.valid;
  }

  async checkTokensRegistered(): Promise<void> {
    const tokens = collectSellTokens(this.orders);
    const registered =
      await this.context.tokenRegistry.areAllTokensRegistered(tokens);
    if (!registered) {
      this.logger.warn({ ringHash: this.hash, tokens }, "Ring uses unregistered tokens");
    }
    this.valid = this.valid && registered;
  }

  /**
   * Scale each order by its owner's spendable amount, then fit the ring.
   * Any failure leaves the ring invalid.
   */
  async calculateFillAmountAndFee(): Promise<void> {
    try {
      await Promise.all(
        this.orders.map((order) =>
          this.context.orderScaler.scaleBySpendableAmount(order)
        )
      );
    } catch (err) {
      this.valid = false;
      throw err;
    }

    this.logger.debug(
      { ringHash: this.hash, size: this.size, rate: ringRate(this.orders) },
      "Fitting ring"
    );

    try {
      fitRing(this.orders);
    } catch (err) {
      this.valid = false;
      if (err instanceof UnsettleableRingError) {
        this.logger.warn(
          { ringHash: this.hash, edgeIndex: err.edgeIndex },
          "Ring is unsettleable"
        );
      }
      throw err;
    }
  }

  /**
   * Transfers that settle the fitted ring. Empty for an invalid ring.
   * Fee and spread always go to the fee holder in full; the wallet share
   * is validated but not split out.
   */
  getTransferItems(walletSplitPercentage: number): TransferItem[] {
    assertValidWalletSplit(walletSplitPercentage);

    if (!this.valid) {
      this.logger.warn({ ringHash: this.hash }, "Ring cannot be settled");
      return [];
    }

    for (const order of this.orders) {
      this.logOrder(order);
    }

    const transferItems = planTransfers(this.orders, this.context.feeHolder);
    this.logger.info(
      {
        ringHash: this.hash,
        transfers: transferItems.length,
        walletSplitPercentage,
      },
      "Ring transfers planned"
    );
    return transferItems;
  }

  /**
   * Run the full settlement sequence for this ring.
   */
  async settle(walletSplitPercentage: number): Promise<TransferItem[]> {
    assertValidWalletSplit(walletSplitPercentage);

    this.checkOrdersValid();
    await this.checkTokensRegistered();
    if (!this.valid) {
      this.logger.warn({ ringHash: this.hash }, "Ring is invalid, skipping fit");
      return [];
    }

    await this.calculateFillAmountAndFee();
    return this.getTransferItems(walletSplitPercentage);
  }

  private logOrder(order: RingOrder): void {
    this.logger.debug(
      {
        orderHash: order.hash,
        amountS: order.amountS.toString(),
        amountB: order.amountB.toString(),
        expectedRate: Number(order.amountS) / Number(order.amountB),
        fillAmountS: order.fillAmountS.toString(),
        fillAmountB: order.fillAmountB.toString(),
        splitS: order.splitS.toString(),
        actualRate:
          order.fillAmountB === 0n
            ? null
            : Number(order.fillAmountS + order.splitS) / Number(order.fillAmountB),
        fillAmountFee: order.fillAmountFee.toString(),
      },
      "Order fill"
    );
  }
}
