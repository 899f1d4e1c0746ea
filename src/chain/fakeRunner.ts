/**
 * In-process contract runner for tests: answers eth_call requests by
 * decoding the calldata against an ABI and encoding a canned result.
 */

import { Interface, type ContractRunner, type InterfaceAbi, type TransactionRequest } from "ethers";

export type CallHandler = (
  to: string,
  method: string,
  args: readonly unknown[]
) => unknown;

export function createFakeRunner(abi: InterfaceAbi, handler: CallHandler) {
  const iface = new Interface(abi);
  const calls: { to: string; method: string }[] = [];

  const runner: ContractRunner = {
    provider: null,
    call: async (tx: TransactionRequest): Promise<string> => {
      const parsed = iface.parseTransaction({ data: tx.data ?? "0x" });
      if (!parsed) throw new Error("fake runner: unknown calldata");
      const to = String(tx.to).toLowerCase();
      calls.push({ to, method: parsed.name });
      const result = handler(to, parsed.name, parsed.args.toArray());
      return iface.encodeFunctionResult(parsed.fragment, [result]);
    },
  };

  return { runner, calls };
}
