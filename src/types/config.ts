export interface SettlerConfig {
  rpcUrl: string;
  feeHolderAddress: string;
  tokenRegistryAddress: string;
  tradeDelegateAddress: string;
  walletSplitPercentage: number;
  retryMax: number;
  retryBaseDelayMs: number;
  logLevel: string;
}
