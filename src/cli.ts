#!/usr/bin/env node
/**
 * Ring settler CLI.
 *
 * Usage:
 *   ring-settler plan <proposal.json> [--wallet-split <pct>] [--skip-registry]
 *
 * Reads a ring proposal, checks it against the chain (token registry,
 * owner balances and allowances), fits the ring and prints the planned
 * transfers as JSON on stdout. Logs go to stderr.
 */

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { ethers } from "ethers";
import { loadConfig } from "./config.js";
import { createLogger } from "./utils/logger.js";
import { Ring } from "./engine/ring.js";
import { OnChainTokenRegistry } from "./chain/tokenRegistry.js";
import { OnChainSpendableScaler } from "./chain/spendable.js";
import { parseRingProposal } from "./proposal/parser.js";
import { serializeTransfers } from "./engine/transfers.js";
import type { TokenRegistry } from "./types/ring.js";

interface PlanOptions {
  walletSplit?: string;
  skipRegistry?: boolean;
}

async function plan(proposalPath: string, opts: PlanOptions): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const walletSplitPercentage =
    opts.walletSplit === undefined
      ? config.walletSplitPercentage
      : Number(opts.walletSplit);

  const proposal = parseRingProposal(
    JSON.parse(readFileSync(proposalPath, "utf-8"))
  );

  const provider = new ethers.JsonRpcProvider(config.rpcUrl);
  const retry = {
    maxRetries: config.retryMax,
    baseDelayMs: config.retryBaseDelayMs,
  };

  const tokenRegistry: TokenRegistry = opts.skipRegistry
    ? { areAllTokensRegistered: async () => true }
    : new OnChainTokenRegistry({
        provider,
        registryAddress: config.tokenRegistryAddress,
        logger,
        retry,
      });

  const ring = new Ring(
    {
      orderScaler: new OnChainSpendableScaler({
        provider,
        tradeDelegateAddress: config.tradeDelegateAddress,
        logger,
        retry,
      }),
      tokenRegistry,
      feeHolder: config.feeHolderAddress,
      logger,
    },
    proposal.orders,
    proposal.owner,
    proposal.feeRecipient
  );

  logger.info(
    { ringHash: ring.hash, size: ring.size, owner: ring.owner },
    "Settling ring"
  );

  const transfers = await ring.settle(walletSplitPercentage);
  process.stdout.write(serializeTransfers(transfers) + "\n");
  provider.destroy();
}

const program = new Command();

program
  .name("ring-settler")
  .description("Fit a ring of orders and plan its settlement transfers");

program
  .command("plan")
  .description("Plan the transfers that settle a ring proposal")
  .argument("<proposal>", "Path to ring proposal JSON")
  .option("-w, --wallet-split <pct>", "Wallet fee split percentage (0-100)")
  .option("--skip-registry", "Do not check token registration")
  .action(async (proposalPath: string, opts: PlanOptions) => {
    await plan(proposalPath, opts);
  });

program.parseAsync(process.argv).catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
