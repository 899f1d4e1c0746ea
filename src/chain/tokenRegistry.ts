import { ethers } from "ethers";
import { TOKEN_REGISTRY_ABI } from "./contracts.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import type { Logger } from "../utils/logger.js";
import type { TokenRegistry } from "../types/ring.js";

export interface TokenRegistryOptions {
  provider: ethers.ContractRunner;
  registryAddress: string;
  logger: Logger;
  retry?: Omit<RetryOptions, "logger">;
}

export class OnChainTokenRegistry implements TokenRegistry {
  private registry: ethers.Contract;
  private logger: Logger;
  private retry: Omit<RetryOptions, "logger">;

  constructor(opts: TokenRegistryOptions) {
    this.registry = new ethers.Contract(
      opts.registryAddress,
      TOKEN_REGISTRY_ABI,
      opts.provider
    );
    this.logger = opts.logger;
    this.retry = opts.retry ?? {};
  }

  async areAllTokensRegistered(tokens: string[]): Promise<boolean> {
    if (tokens.length === 0) return true;

    const registered = await withRetry(
      async (): Promise<boolean> =>
        Boolean(await this.registry.areAllTokensRegistered(tokens)),
      { ...this.retry, logger: this.logger }
    );

    this.logger.debug({ tokens, registered }, "Token registration checked");
    return registered;
  }
}
