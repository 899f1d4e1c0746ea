import { describe, it, expect } from "vitest";
import { parseRingProposal } from "./parser.js";
import { BadParameterError } from "../utils/errors.js";

const ALICE = "0x1111111111111111111111111111111111111111";
const BOB = "0x2222222222222222222222222222222222222222";
const MINER = "0x8888888888888888888888888888888888888888";
const TOKEN_X = "0x000000000000000000000000000000000000000a";
const TOKEN_Y = "0x000000000000000000000000000000000000000b";

function rawOrder(overrides: Record<string, unknown> = {}) {
  return {
    hash: "0x" + "ab".repeat(32),
    owner: ALICE,
    tokenS: TOKEN_X,
    tokenB: TOKEN_Y,
    feeToken: TOKEN_X,
    amountS: "1000000000000000000000",
    amountB: 500,
    feeAmount: "0",
    ...overrides,
  };
}

function rawProposal(orders: unknown[]) {
  return { owner: MINER, feeRecipient: MINER, orders };
}

describe("parseRingProposal", () => {
  it("parses orders with fill fields at their nominal amounts", () => {
    const proposal = parseRingProposal(
      rawProposal([rawOrder(), rawOrder({ owner: BOB, tokenS: TOKEN_Y, tokenB: TOKEN_X, valid: false })])
    );

    expect(proposal.owner).toBe(MINER);
    expect(proposal.feeRecipient).toBe(MINER);
    expect(proposal.orders).toHaveLength(2);

    const [first, second] = proposal.orders;
    expect(first.amountS).toBe(10n ** 21n);
    expect(first.amountB).toBe(500n);
    expect(first.fillAmountS).toBe(10n ** 21n);
    expect(first.fillAmountB).toBe(500n);
    expect(first.fillAmountFee).toBe(0n);
    expect(first.splitS).toBe(0n);
    expect(first.valid).toBe(true);
    expect(first.walletAddr).toBeUndefined();
    expect(second.owner).toBe(BOB);
    expect(second.valid).toBe(false);
  });

  it("keeps an optional wallet address", () => {
    const proposal = parseRingProposal(rawProposal([rawOrder({ walletAddr: BOB }), rawOrder()]));
    expect(proposal.orders[0].walletAddr).toBe(BOB);
  });

  it("requires at least two orders", () => {
    expect(() => parseRingProposal(rawProposal([rawOrder()]))).toThrow(
      "proposal.orders: expected at least 2 orders"
    );
  });

  it("rejects non-object input", () => {
    expect(() => parseRingProposal("ring")).toThrow(BadParameterError);
    expect(() => parseRingProposal(null)).toThrow(BadParameterError);
  });

  it("names the field holding a bad address", () => {
    expect(() =>
      parseRingProposal(rawProposal([rawOrder(), rawOrder({ tokenB: "0x1234" })]))
    ).toThrow("proposal.orders[1].tokenB: expected an address");
  });

  it("rejects hashes that are not 32 bytes", () => {
    expect(() =>
      parseRingProposal(rawProposal([rawOrder({ hash: "0xabcd" }), rawOrder()]))
    ).toThrow("proposal.orders[0].hash: expected a 32-byte hex string");
  });

  it("rejects negative, fractional and malformed amounts", () => {
    for (const amountS of [-1, 1.5, "12abc", "-3", null]) {
      expect(() =>
        parseRingProposal(rawProposal([rawOrder({ amountS }), rawOrder()]))
      ).toThrow("proposal.orders[0].amountS: expected a non-negative integer amount");
    }
  });

  it("rejects zero nominal amounts", () => {
    expect(() =>
      parseRingProposal(rawProposal([rawOrder(), rawOrder({ amountB: "0" })]))
    ).toThrow("proposal.orders[1]: amountS and amountB must be positive");
  });

  it("rejects a non-boolean validity flag", () => {
    expect(() =>
      parseRingProposal(rawProposal([rawOrder({ valid: "yes" }), rawOrder()]))
    ).toThrow("proposal.orders[0].valid: expected a boolean");
  });
});
