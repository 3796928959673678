import { isNumber } from "lodash";
import type { Address } from "viem";

import { PriceProvider } from "./PriceProvider";
import { HttpProviderConnector } from "../connector";
import { NETWORKS } from "../../config/networks";
import { NetworkConfig } from "../../types";
import { ConfigError, ContractCallError, toError } from "../../utils/errors";
import { Logger, getLogger } from "../../utils/Logger";

/** `{ "<lowercase address>": { "usd": 1.23 } }` */
export type TokenPriceResponse = Record<string, { usd?: number } | undefined>;

/**
 * Token prices from a CoinGecko-style `simple/token_price` endpoint,
 * one URL per network.
 */
export class CoinGeckoPriceProvider implements PriceProvider {
  constructor(
    private readonly connector: HttpProviderConnector,
    private readonly networks: Readonly<Record<string, NetworkConfig>> = NETWORKS,
    private readonly logger: Logger = getLogger(module)
  ) {}

  async priceUSD(network: string, token: Address): Promise<number | null> {
    const networkConfig = Object.prototype.hasOwnProperty.call(this.networks, network)
      ? this.networks[network]
      : undefined;
    if (!networkConfig) {
      throw new ConfigError(
        `Unknown network: ${network}. Available: ${Object.keys(this.networks).join(", ")}`
      );
    }

    const address = token.toLowerCase();
    let response: TokenPriceResponse;
    try {
      response = await this.connector.get<TokenPriceResponse>(
        networkConfig.priceOracleUrl,
        { accept: "application/json" },
        { contract_addresses: address, vs_currencies: "usd" }
      );
    } catch (error) {
      const cause = toError(error);
      throw new ContractCallError(
        `Price lookup failed: ${cause.message}`,
        { method: "priceUSD", token, network },
        cause
      );
    }

    const price = response[address]?.usd;
    if (!isNumber(price)) {
      this.logger.error(`Token ${token} not found in price oracle data for ${network}`);
      return null;
    }
    return price;
  }
}
