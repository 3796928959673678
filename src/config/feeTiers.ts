import { FEE_TIER_TICK_SPACING } from "../constants";
import { FeeTier } from "../types";

export function isFeeTier(fee: number): fee is FeeTier {
  return Object.prototype.hasOwnProperty.call(FEE_TIER_TICK_SPACING, fee);
}

export const FEE_TIERS = Object.keys(FEE_TIER_TICK_SPACING).map(Number);
