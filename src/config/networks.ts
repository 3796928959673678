import type { Address } from "viem";
import { NetworkConfig } from "../types";

const PRICE_ORACLE_BASE_URL = "https://api.coingecko.com/api/v3/simple/token_price";

const CANONICAL_POSITION_MANAGER: Address = "0xC36442b4a4522E871399CD717aBDD847Ab11FE88";
const CANONICAL_FACTORY: Address = "0x1F98431c8aD98523631AE4a59f267346ea31F984";

export const DEFAULT_NETWORK = "polygon";

export const NETWORKS: Readonly<Record<string, NetworkConfig>> = {
  ethereum: {
    chainId: 1,
    rpcUrl: "https://eth.llamarpc.com",
    priceOracleUrl: `${PRICE_ORACLE_BASE_URL}/ethereum`,
    positionManagerAddress: CANONICAL_POSITION_MANAGER,
    factoryAddress: CANONICAL_FACTORY,
    nativeSymbol: "ETH",
  },
  polygon: {
    chainId: 137,
    rpcUrl: "https://polygon-rpc.com",
    priceOracleUrl: `${PRICE_ORACLE_BASE_URL}/polygon-pos`,
    positionManagerAddress: CANONICAL_POSITION_MANAGER,
    factoryAddress: CANONICAL_FACTORY,
    nativeSymbol: "MATIC",
  },
  arbitrum: {
    chainId: 42161,
    rpcUrl: "https://arb1.arbitrum.io/rpc",
    priceOracleUrl: `${PRICE_ORACLE_BASE_URL}/arbitrum-one`,
    positionManagerAddress: CANONICAL_POSITION_MANAGER,
    factoryAddress: CANONICAL_FACTORY,
    nativeSymbol: "ETH",
  },
  optimism: {
    chainId: 10,
    rpcUrl: "https://mainnet.optimism.io",
    priceOracleUrl: `${PRICE_ORACLE_BASE_URL}/optimistic-ethereum`,
    positionManagerAddress: CANONICAL_POSITION_MANAGER,
    factoryAddress: CANONICAL_FACTORY,
    nativeSymbol: "ETH",
  },
  base: {
    chainId: 8453,
    rpcUrl: "https://mainnet.base.org",
    priceOracleUrl: `${PRICE_ORACLE_BASE_URL}/base`,
    positionManagerAddress: "0x03a520b32C04BF3bEEf7BEb72E919cf822Ed34f1",
    factoryAddress: "0x33128a8fC17869897dcE68Ed026d694621f6FDfD",
    nativeSymbol: "ETH",
  },
};

export function getNetwork(name: string): NetworkConfig | undefined {
  return Object.prototype.hasOwnProperty.call(NETWORKS, name) ? NETWORKS[name] : undefined;
}
