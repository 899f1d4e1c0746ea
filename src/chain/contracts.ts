/**
 * Contract ABIs.
 *
 * Only includes the ABI fragments needed by the settler.
 */

export const TOKEN_REGISTRY_ABI = [
  "function areAllTokensRegistered(address[] tokens) external view returns (bool)",
] as const;

export const ERC20_ABI = [
  "function balanceOf(address account) external view returns (uint256)",
  "function allowance(address owner, address spender) external view returns (uint256)",
] as const;
