/**
 * Display names for well-known chain ids
 */
export const NETWORKS: Readonly<Record<number, string>> = {
  1: "Ethereum Mainnet",
  10: "Optimism",
  137: "Polygon",
  8453: "Base",
  42161: "Arbitrum One",
  11155111: "Sepolia Testnet",
};

export function networkName(chainId: number): string {
  return NETWORKS[chainId] ?? `Unknown (chain ID ${chainId})`;
}
