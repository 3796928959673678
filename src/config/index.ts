import dotenv from 'dotenv';
import { Hex, isHex } from 'viem';
import { DEFAULT_DEADLINE_SECONDS, DEFAULT_MAX_SLIPPAGE_PERCENT } from '../constants';
import { ManagerConfig } from '../types';
import { ConfigError } from '../utils/errors';
import { DEFAULT_NETWORK, NETWORKS, getNetwork } from './networks';

dotenv.config();

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Mutating commands need a signing key; read-only ones do not */
  requirePrivateKey?: boolean;
}

function getEnvVar(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvVarWithDefault(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function parseNumber(env: Env, name: string, defaultValue: number): number {
  const raw = getEnvVarWithDefault(env, name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parsePrivateKey(raw: string): Hex {
  if (!isHex(raw) || raw.length !== 66) {
    throw new ConfigError('Invalid PRIVATE_KEY format. Must be 0x-prefixed 64 hex chars');
  }
  return raw;
}

export function loadConfig(
  { requirePrivateKey = false }: LoadConfigOptions = {},
  env: Env = process.env
): ManagerConfig {
  const network = getEnvVarWithDefault(env, 'NETWORK', DEFAULT_NETWORK);
  const networkConfig = getNetwork(network);
  if (!networkConfig) {
    throw new ConfigError(
      `Unknown NETWORK "${network}". Available: ${Object.keys(NETWORKS).join(', ')}`
    );
  }

  const privateKey = requirePrivateKey
    ? parsePrivateKey(getEnvVar(env, 'PRIVATE_KEY'))
    : env.PRIVATE_KEY
      ? parsePrivateKey(env.PRIVATE_KEY)
      : undefined;

  const config: ManagerConfig = {
    network,
    chainId: networkConfig.chainId,
    rpcUrl: getEnvVarWithDefault(env, 'RPC_URL', networkConfig.rpcUrl),
    priceOracleUrl: networkConfig.priceOracleUrl,
    positionManagerAddress: networkConfig.positionManagerAddress,
    factoryAddress: networkConfig.factoryAddress,
    privateKey,
    maxSlippagePercent: parseNumber(env, 'MAX_SLIPPAGE_PERCENT', DEFAULT_MAX_SLIPPAGE_PERCENT),
    gasPriceMultiplier: parseNumber(env, 'GAS_PRICE_MULTIPLIER', 1.0),
    deadlineSeconds: parseNumber(env, 'DEADLINE_SECONDS', DEFAULT_DEADLINE_SECONDS),
    receiptTimeoutMs: parseNumber(env, 'RECEIPT_TIMEOUT_MS', 180_000),
    receiptConfirmations: parseNumber(env, 'RECEIPT_CONFIRMATIONS', 1),
    readConcurrency: parseNumber(env, 'READ_CONCURRENCY', 8),
  };

  return config;
}

export function validateConfig(config: ManagerConfig): void {
  if (config.maxSlippagePercent < 0 || config.maxSlippagePercent > 100) {
    throw new ConfigError('MAX_SLIPPAGE_PERCENT must be between 0 and 100');
  }

  if (config.gasPriceMultiplier <= 0) {
    throw new ConfigError('GAS_PRICE_MULTIPLIER must be positive');
  }

  if (!Number.isInteger(config.deadlineSeconds) || config.deadlineSeconds <= 0) {
    throw new ConfigError('DEADLINE_SECONDS must be a positive integer');
  }

  if (config.receiptTimeoutMs < 1000) {
    throw new ConfigError('RECEIPT_TIMEOUT_MS must be at least 1000ms');
  }

  if (!Number.isInteger(config.receiptConfirmations) || config.receiptConfirmations < 1) {
    throw new ConfigError('RECEIPT_CONFIRMATIONS must be a positive integer');
  }

  if (!Number.isInteger(config.readConcurrency) || config.readConcurrency < 1) {
    throw new ConfigError('READ_CONCURRENCY must be a positive integer');
  }
}
