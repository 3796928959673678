import type { Address } from "viem";

export interface PriceProvider {
  /**
   * USD price of one whole `token` on `network`, or null when the oracle
   * does not list it
   */
  priceUSD(network: string, token: Address): Promise<number | null>;
}
