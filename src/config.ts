import "dotenv/config";
import type { SettlerConfig } from "./types/config.js";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export function loadConfig(): SettlerConfig {
  return {
    rpcUrl: requireEnv("RPC_URL"),
    feeHolderAddress: requireEnv("FEE_HOLDER_ADDRESS"),
    tokenRegistryAddress: requireEnv("TOKEN_REGISTRY_ADDRESS"),
    tradeDelegateAddress: requireEnv("TRADE_DELEGATE_ADDRESS"),
    walletSplitPercentage: Number(process.env.WALLET_SPLIT_PERCENTAGE ?? "0"),
    retryMax: parseInt(process.env.RETRY_MAX ?? "3", 10),
    retryBaseDelayMs: parseInt(process.env.RETRY_BASE_DELAY_MS ?? "1000", 10),
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}
