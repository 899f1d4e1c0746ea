/**
 * Spendable amount lookup.
 *
 * An owner can spend min(balance, allowance granted to the trade delegate)
 * of a token. Reads are retried since they go over RPC.
 */

import { ethers } from "ethers";
import { ERC20_ABI } from "./contracts.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import { feePaidInSellToken, scaleToSpendable } from "../engine/spendable.js";
import type { Logger } from "../utils/logger.js";
import type { RingOrder } from "../types/order.js";
import type { SpendableScaler } from "../types/ring.js";

export interface SpendableScalerOptions {
  provider: ethers.ContractRunner;
  tradeDelegateAddress: string;
  logger: Logger;
  retry?: Omit<RetryOptions, "logger">;
}

export class OnChainSpendableScaler implements SpendableScaler {
  private provider: ethers.ContractRunner;
  private tradeDelegate: string;
  private logger: Logger;
  private retry: Omit<RetryOptions, "logger">;

  constructor(opts: SpendableScalerOptions) {
    this.provider = opts.provider;
    this.tradeDelegate = opts.tradeDelegateAddress;
    this.logger = opts.logger;
    this.retry = opts.retry ?? {};
  }

  /**
   * min(balanceOf(owner), allowance(owner, tradeDelegate)) for one token.
   */
  async getSpendable(token: string, owner: string): Promise<bigint> {
    const erc20 = new ethers.Contract(token, ERC20_ABI, this.provider);
    const [balance, allowance] = await withRetry(
      async (): Promise<[bigint, bigint]> => [
        BigInt(await erc20.balanceOf(owner)),
        BigInt(await erc20.allowance(owner, this.tradeDelegate)),
      ],
      { ...this.retry, logger: this.logger }
    );
    return balance < allowance ? balance : allowance;
  }

  async scaleBySpendableAmount(order: RingOrder): Promise<void> {
    const spendableS = await this.getSpendable(order.tokenS, order.owner);
    const spendableFee =
      order.feeAmount === 0n || feePaidInSellToken(order)
        ? spendableS
        : await this.getSpendable(order.feeToken, order.owner);

    scaleToSpendable(order, { tokenS: spendableS, feeToken: spendableFee });

    this.logger.debug(
      {
        orderHash: order.hash,
        spendableS: spendableS.toString(),
        spendableFee: spendableFee.toString(),
        fillAmountS: order.fillAmountS.toString(),
        fillAmountB: order.fillAmountB.toString(),
        fillAmountFee: order.fillAmountFee.toString(),
      },
      "Order scaled by spendable amount"
    );
  }
}
