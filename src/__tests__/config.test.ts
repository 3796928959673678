/**
 * Tests for configuration loading
 */

import { loadConfig, validateConfig } from '../config';
import { NETWORKS } from '../config/networks';
import { ConfigError } from '../utils/errors';

const PLACEHOLDER_KEY = `0x${'0'.repeat(63)}1`;

describe('config', () => {
  describe('loadConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = loadConfig({}, {});

      expect(config).toEqual({
        network: 'polygon',
        chainId: 137,
        rpcUrl: 'https://polygon-rpc.com',
        priceOracleUrl: 'https://api.coingecko.com/api/v3/simple/token_price/polygon-pos',
        positionManagerAddress: '0xC36442b4a4522E871399CD717aBDD847Ab11FE88',
        factoryAddress: '0x1F98431c8aD98523631AE4a59f267346ea31F984',
        privateKey: undefined,
        maxSlippagePercent: 30,
        gasPriceMultiplier: 1,
        deadlineSeconds: 3600,
        receiptTimeoutMs: 180_000,
        receiptConfirmations: 1,
        readConcurrency: 8,
      });
    });

    it('should take the network and RPC override from the environment', () => {
      const config = loadConfig({}, { NETWORK: 'base', RPC_URL: 'http://localhost:8545' });

      expect(config.chainId).toBe(8453);
      expect(config.rpcUrl).toBe('http://localhost:8545');
      expect(config.positionManagerAddress).toBe(NETWORKS.base.positionManagerAddress);
    });

    it('should parse numeric settings', () => {
      const config = loadConfig(
        {},
        { MAX_SLIPPAGE_PERCENT: '0.5', GAS_PRICE_MULTIPLIER: '1.25', READ_CONCURRENCY: '4' }
      );

      expect(config.maxSlippagePercent).toBe(0.5);
      expect(config.gasPriceMultiplier).toBe(1.25);
      expect(config.readConcurrency).toBe(4);
    });

    it('should reject an unknown network', () => {
      expect(() => loadConfig({}, { NETWORK: 'mars' })).toThrow(ConfigError);
    });

    it('should reject a non-numeric setting', () => {
      expect(() => loadConfig({}, { DEADLINE_SECONDS: 'soon' })).toThrow(
        'DEADLINE_SECONDS must be a number, got "soon"'
      );
    });

    it('should require a private key for mutating commands', () => {
      expect(() => loadConfig({ requirePrivateKey: true }, {})).toThrow(
        'Missing required environment variable: PRIVATE_KEY'
      );
    });

    it('should reject a malformed private key', () => {
      expect(() => loadConfig({}, { PRIVATE_KEY: 'test-secret' })).toThrow(ConfigError);
    });

    it('should accept a well-formed private key', () => {
      const config = loadConfig({ requirePrivateKey: true }, { PRIVATE_KEY: PLACEHOLDER_KEY });

      expect(config.privateKey).toBe(PLACEHOLDER_KEY);
    });
  });

  describe('validateConfig', () => {
    const valid = loadConfig({}, {});

    it('should accept the defaults', () => {
      expect(() => validateConfig(valid)).not.toThrow();
    });

    it.each([
      [{ maxSlippagePercent: 150 }, 'MAX_SLIPPAGE_PERCENT must be between 0 and 100'],
      [{ gasPriceMultiplier: 0 }, 'GAS_PRICE_MULTIPLIER must be positive'],
      [{ deadlineSeconds: 1.5 }, 'DEADLINE_SECONDS must be a positive integer'],
      [{ receiptTimeoutMs: 10 }, 'RECEIPT_TIMEOUT_MS must be at least 1000ms'],
      [{ receiptConfirmations: 0 }, 'RECEIPT_CONFIRMATIONS must be a positive integer'],
      [{ readConcurrency: 0 }, 'READ_CONCURRENCY must be a positive integer'],
    ])('should reject %p', (override, message) => {
      expect(() => validateConfig({ ...valid, ...override })).toThrow(message);
    });
  });
});
