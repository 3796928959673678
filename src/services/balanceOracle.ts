import Decimal from "decimal.js";
import type { Address } from "viem";
import { PreciseDecimal } from "../constants";
import { IContractGateway } from "./contractGateway";

/**
 * ERC-20 decimals and balances, read live through the gateway.
 * Failures propagate as ContractCallError.
 */
export class BalanceOracle {
  constructor(private readonly gateway: IContractGateway) {}

  decimalsOf(token: Address): Promise<number> {
    return this.gateway.getTokenDecimals(token);
  }

  rawBalanceOf(owner: Address, token: Address): Promise<bigint> {
    return this.gateway.getTokenBalance(owner, token);
  }

  /**
   * Balance in whole-token units (raw balance / 10^decimals)
   */
  async balanceOf(owner: Address, token: Address, decimals?: number): Promise<Decimal> {
    const [raw, tokenDecimals] = await Promise.all([
      this.rawBalanceOf(owner, token),
      decimals === undefined ? this.decimalsOf(token) : Promise.resolve(decimals),
    ]);
    return new PreciseDecimal(raw.toString()).div(PreciseDecimal.pow(10, tokenDecimals));
  }
}
