import { describe, it, expect } from "vitest";
import pino from "pino";
import { OnChainTokenRegistry } from "./tokenRegistry.js";
import { TOKEN_REGISTRY_ABI } from "./contracts.js";
import { createFakeRunner } from "./fakeRunner.js";

const REGISTRY = "0x7777777777777777777777777777777777777777";
const TOKEN_A = "0x000000000000000000000000000000000000000a";
const TOKEN_B = "0x000000000000000000000000000000000000000b";
const logger = pino({ level: "silent" });

describe("OnChainTokenRegistry", () => {
  it("returns the registry's answer for the token list", async () => {
    const registered = new Set([TOKEN_A.toLowerCase()]);
    const { runner, calls } = createFakeRunner(TOKEN_REGISTRY_ABI, (_to, _method, args) => {
      const tokens = args[0];
      return Array.isArray(tokens) && tokens.every((t) => registered.has(String(t).toLowerCase()));
    });
    const registry = new OnChainTokenRegistry({ provider: runner, registryAddress: REGISTRY, logger });

    expect(await registry.areAllTokensRegistered([TOKEN_A])).toBe(true);
    expect(await registry.areAllTokensRegistered([TOKEN_A, TOKEN_B])).toBe(false);
    expect(calls).toEqual([
      { to: REGISTRY, method: "areAllTokensRegistered" },
      { to: REGISTRY, method: "areAllTokensRegistered" },
    ]);
  });

  it("does not call the contract for an empty list", async () => {
    const { runner, calls } = createFakeRunner(TOKEN_REGISTRY_ABI, () => true);
    const registry = new OnChainTokenRegistry({ provider: runner, registryAddress: REGISTRY, logger });

    expect(await registry.areAllTokensRegistered([])).toBe(true);
    expect(calls).toHaveLength(0);
  });

  it("retries failed reads", async () => {
    let attempts = 0;
    const { runner } = createFakeRunner(TOKEN_REGISTRY_ABI, () => {
      attempts++;
      if (attempts === 1) throw new Error("connection reset");
      return true;
    });
    const registry = new OnChainTokenRegistry({
      provider: runner,
      registryAddress: REGISTRY,
      logger,
      retry: { maxRetries: 2, baseDelayMs: 1 },
    });

    expect(await registry.areAllTokensRegistered([TOKEN_A])).toBe(true);
    expect(attempts).toBe(2);
  });
});
