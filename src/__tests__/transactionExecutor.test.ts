/**
 * Tests for TransactionExecutor
 */

import { Address } from 'viem';
import { TransactionExecutor } from '../services/transactionExecutor';
import { TransactionReceipt, TransactionSigner } from '../types';
import {
  TransactionRevertedError,
  UnconfirmedTransactionError,
} from '../utils/errors';
import { KeyedMutex } from '../utils/ParallelQueue';
import { promiseWithResolvers } from '../utils/promiseWithResolver';
import {
  OTHER,
  OWNER,
  createMockLogger,
  createMockTransport,
  makeIntent,
  makeReceipt,
  txHash,
} from './helpers/mocks';

const flush = () => new Promise((resolve) => setImmediate(resolve));

function createSigner(address: Address = OWNER): jest.Mocked<TransactionSigner> {
  return {
    address,
    sign: jest.fn().mockResolvedValue('0xf86b'),
  };
}

describe('TransactionExecutor', () => {
  let transport: ReturnType<typeof createMockTransport>;
  let signer: jest.Mocked<TransactionSigner>;
  let logger: ReturnType<typeof createMockLogger>;
  let locks: KeyedMutex;
  let executor: TransactionExecutor;

  beforeEach(() => {
    jest.clearAllMocks();
    transport = createMockTransport();
    signer = createSigner();
    logger = createMockLogger();
    locks = new KeyedMutex();
    executor = new TransactionExecutor(
      transport,
      signer,
      { receiptTimeoutMs: 5000, receiptConfirmations: 2 },
      logger,
      locks
    );

    transport.getTransactionCount.mockResolvedValue(7);
    transport.sendRaw.mockResolvedValue(txHash(1));
  });

  it('TEST 1: should sign with the pending nonce, send and return the receipt', async () => {
    const receipt = makeReceipt(1);
    transport.waitReceipt.mockResolvedValue(receipt);
    const intent = makeIntent('mint');

    await expect(executor.execute(intent, 'mint')).resolves.toBe(receipt);

    expect(transport.getTransactionCount).toHaveBeenCalledWith(OWNER);
    expect(signer.sign).toHaveBeenCalledWith({ ...intent, nonce: 7 });
    expect(transport.sendRaw).toHaveBeenCalledWith('0xf86b');
    expect(transport.waitReceipt).toHaveBeenCalledWith(txHash(1), {
      confirmations: 2,
      timeoutMs: 5000,
    });
    expect(logger.info).toHaveBeenCalledWith(
      `mint: tx ${txHash(1)} confirmed in block 101 (gas used 21000)`
    );
  });

  it('TEST 2: should throw TransactionRevertedError for a reverted receipt', async () => {
    transport.waitReceipt.mockResolvedValue(makeReceipt(1, { status: 'reverted' }));

    const error = await executor.execute(makeIntent('burn'), 'burn').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransactionRevertedError);
    expect(error).toMatchObject({ transactionHash: txHash(1), step: 'burn' });
  });

  it('TEST 3: should give up waiting after the receipt timeout', async () => {
    executor = new TransactionExecutor(
      transport,
      signer,
      { receiptTimeoutMs: 20, receiptConfirmations: 1 },
      logger,
      locks
    );
    transport.waitReceipt.mockReturnValue(new Promise<TransactionReceipt>(() => undefined));

    const error = await executor.execute(makeIntent('mint'), 'mint').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnconfirmedTransactionError);
    expect(error).toMatchObject({ transactionHash: txHash(1), step: 'mint' });
    expect(logger.warn).toHaveBeenCalledWith(`mint: tx ${txHash(1)} unconfirmed after 20ms`);
  });

  it('TEST 4: should report a transport-side timeout against the executing step', async () => {
    transport.waitReceipt.mockRejectedValue(
      new UnconfirmedTransactionError(txHash(1), 'waitReceipt', 5000)
    );

    const error = await executor
      .execute(makeIntent('collect'), 'collect')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnconfirmedTransactionError);
    expect(error).toMatchObject({ step: 'collect' });
  });

  it('TEST 5: should propagate send failures without waiting for a receipt', async () => {
    transport.sendRaw.mockRejectedValue(new Error('nonce too low'));

    await expect(executor.execute(makeIntent('mint'), 'mint')).rejects.toThrow('nonce too low');
    expect(transport.waitReceipt).not.toHaveBeenCalled();
  });

  it('TEST 6: should serialise sends from the same wallet', async () => {
    const first = promiseWithResolvers<TransactionReceipt>();
    transport.waitReceipt
      .mockReturnValueOnce(first.promise)
      .mockResolvedValueOnce(makeReceipt(2));

    const a = executor.execute(makeIntent('approve'), 'approve');
    const b = executor.execute(makeIntent('mint'), 'mint');
    await flush();

    expect(transport.getTransactionCount).toHaveBeenCalledTimes(1);

    first.resolve(makeReceipt(1));
    await a;
    await b;

    expect(transport.getTransactionCount).toHaveBeenCalledTimes(2);
  });

  it('TEST 7: should not block sends from a different wallet', async () => {
    const other = new TransactionExecutor(
      transport,
      createSigner(OTHER),
      { receiptTimeoutMs: 5000, receiptConfirmations: 1 },
      logger,
      locks
    );
    const pending = promiseWithResolvers<TransactionReceipt>();
    transport.waitReceipt.mockReturnValue(pending.promise);

    const a = executor.execute(makeIntent('mint'), 'mint');
    const b = other.execute(makeIntent('mint'), 'mint');
    await flush();

    expect(transport.getTransactionCount).toHaveBeenCalledTimes(2);
    expect(transport.getTransactionCount).toHaveBeenCalledWith(OTHER);

    pending.resolve(makeReceipt(1));
    await Promise.all([a, b]);
  });
});
