/**
 * Tests for WalletSigner
 */

import { parseTransaction } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { WalletSigner } from '../services/walletSigner';
import { ConfigError } from '../utils/errors';
import { POSITION_MANAGER, createMockLogger, makeIntent } from './helpers/mocks';

const PLACEHOLDER_KEY = `0x${'0'.repeat(63)}1` as const;

describe('WalletSigner', () => {
  it('should derive the address from the key', () => {
    const signer = new WalletSigner(PLACEHOLDER_KEY, createMockLogger());

    expect(signer.address).toBe(privateKeyToAccount(PLACEHOLDER_KEY).address);
  });

  it('should reject a malformed key', () => {
    expect(() => new WalletSigner('0x1234', createMockLogger())).toThrow(ConfigError);
  });

  it('should sign a legacy transaction carrying the intent fields', async () => {
    const signer = new WalletSigner(PLACEHOLDER_KEY, createMockLogger());
    const intent = makeIntent('burn');

    const signed = await signer.sign({ ...intent, data: '0x42966c68', nonce: 3 });
    const parsed = parseTransaction(signed);

    expect(parsed).toMatchObject({
      type: 'legacy',
      to: POSITION_MANAGER,
      nonce: 3,
      chainId: 137,
      gas: 100_000n,
      gasPrice: 100n,
      data: '0x42966c68',
    });
  });
});
