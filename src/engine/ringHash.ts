/**
 * Ring identity: keccak256 over the packed order hashes, in ring order.
 *
 * Equivalent to solidityPackedKeccak256(["bytes32", ...], hashes), so the
 * value matches what a settlement contract derives from the same ring.
 */

import { concat, keccak256 } from "ethers";

export function computeRingHash(orderHashes: readonly string[]): string {
  return keccak256(concat([...orderHashes]));
}
