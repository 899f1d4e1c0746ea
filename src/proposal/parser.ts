/**
 * Parse a ring proposal from untyped JSON.
 *
 * Expected shape:
 *   {
 *     "owner": "0x…", "feeRecipient": "0x…",
 *     "orders": [{ "hash", "owner", "tokenS", "tokenB", "feeToken",
 *                  "amountS", "amountB", "feeAmount", "walletAddr"?, "valid"? }]
 *   }
 * Amounts are decimal strings (or safe integers) in token base units.
 */

import { isAddress, isHexString } from "ethers";
import { createRingOrder, type RingOrder } from "../types/order.js";
import type { RingProposal } from "../types/ring.js";
import { BadParameterError } from "../utils/errors.js";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAddress(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== "string" || !isAddress(value)) {
    throw new BadParameterError(`${path}.${key}: expected an address`);
  }
  return value;
}

function readAmount(obj: JsonObject, key: string, path: string): bigint {
  const value = obj[key];
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new BadParameterError(`${path}.${key}: expected a non-negative integer amount`);
}

function parseOrder(value: unknown, path: string): RingOrder {
  if (!isObject(value)) {
    throw new BadParameterError(`${path}: expected an object`);
  }

  const hash = value.hash;
  if (typeof hash !== "string" || !isHexString(hash, 32)) {
    throw new BadParameterError(`${path}.hash: expected a 32-byte hex string`);
  }

  const amountS = readAmount(value, "amountS", path);
  const amountB = readAmount(value, "amountB", path);
  if (amountS === 0n || amountB === 0n) {
    throw new BadParameterError(`${path}: amountS and amountB must be positive`);
  }

  const valid = value.valid;
  if (valid !== undefined && typeof valid !== "boolean") {
    throw new BadParameterError(`${path}.valid: expected a boolean`);
  }

  return createRingOrder({
    hash,
    owner: readAddress(value, "owner", path),
    tokenS: readAddress(value, "tokenS", path),
    tokenB: readAddress(value, "tokenB", path),
    feeToken: readAddress(value, "feeToken", path),
    walletAddr:
      value.walletAddr === undefined
        ? undefined
        : readAddress(value, "walletAddr", path),
    amountS,
    amountB,
    feeAmount: readAmount(value, "feeAmount", path),
    valid,
  });
}

export function parseRingProposal(json: unknown): RingProposal {
  if (!isObject(json)) {
    throw new BadParameterError("proposal: expected an object");
  }
  if (!Array.isArray(json.orders) || json.orders.length < 2) {
    throw new BadParameterError("proposal.orders: expected at least 2 orders");
  }

  return {
    owner: readAddress(json, "owner", "proposal"),
    feeRecipient: readAddress(json, "feeRecipient", "proposal"),
    orders: json.orders.map((o: unknown, i: number) =>
      parseOrder(o, `proposal.orders[${i}]`)
    ),
  };
}
