import { InvalidArgumentError } from 'commander';
import { Address, isAddress } from 'viem';
import { FEE_TIERS, isFeeTier } from '../config/feeTiers';
import { FeeTier } from '../types';

export function parseAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new InvalidArgumentError('Not a 0x-prefixed 20-byte address.');
  }
  return value;
}

export function parseBigInt(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return BigInt(value);
}

export function parseFeeTier(value: string): FeeTier {
  const fee = Number(value);
  if (!isFeeTier(fee)) {
    throw new InvalidArgumentError(`Fee tier must be one of ${FEE_TIERS.join(', ')}.`);
  }
  return fee;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive number.');
  }
  return parsed;
}

export function parsePercent(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError('Not a percentage within [0, 100].');
  }
  return parsed;
}
