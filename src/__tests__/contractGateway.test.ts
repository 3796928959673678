/**
 * Tests for ContractGateway
 */

import {
  encodeFunctionData,
  encodeFunctionResult,
  padHex,
  zeroAddress,
} from 'viem';
import { FACTORY_ABI, POSITION_MANAGER_ABI } from '../abis';
import { ContractGateway, TRANSFER_EVENT_TOPIC } from '../services/contractGateway';
import {
  ContractCallError,
  PoolNotFoundError,
  PositionNotFoundError,
} from '../utils/errors';
import {
  FACTORY,
  OWNER,
  POOL,
  POSITION_MANAGER,
  TOKEN_0,
  TOKEN_1,
  createMockLogger,
  createMockTransport,
} from './helpers/mocks';

describe('ContractGateway', () => {
  let transport: ReturnType<typeof createMockTransport>;
  let gateway: ContractGateway;

  beforeEach(() => {
    jest.clearAllMocks();
    transport = createMockTransport();
    gateway = new ContractGateway(
      transport,
      {
        chainId: 137,
        positionManagerAddress: POSITION_MANAGER,
        factoryAddress: FACTORY,
        gasPriceMultiplier: 1.5,
      },
      createMockLogger()
    );
  });

  describe('getPosition', () => {
    it('should decode positions() into a Position', async () => {
      transport.call.mockResolvedValue(
        encodeFunctionResult({
          abi: POSITION_MANAGER_ABI,
          functionName: 'positions',
          result: [
            5n,
            zeroAddress,
            TOKEN_0,
            TOKEN_1,
            3000,
            -540,
            480,
            123456789n,
            0n,
            0n,
            7n,
            8n,
          ],
        })
      );

      const position = await gateway.getPosition(42n);

      expect(transport.call).toHaveBeenCalledWith(
        POSITION_MANAGER,
        encodeFunctionData({ abi: POSITION_MANAGER_ABI, functionName: 'positions', args: [42n] })
      );
      expect(position).toEqual({
        tokenId: 42n,
        nonce: 5n,
        operator: zeroAddress,
        token0: TOKEN_0,
        token1: TOKEN_1,
        fee: 3000,
        tickLower: -540,
        tickUpper: 480,
        liquidity: 123456789n,
        tokensOwed0: 7n,
        tokensOwed1: 8n,
      });
    });

    it('should report an unknown token id as PositionNotFoundError', async () => {
      transport.call.mockRejectedValue(new Error('execution reverted: Invalid token ID'));

      await expect(gateway.getPosition(9n)).rejects.toBeInstanceOf(PositionNotFoundError);
    });

    it('should wrap other failures in ContractCallError with context', async () => {
      transport.call.mockRejectedValue(new Error('socket hang up'));

      const error = await gateway.getPosition(9n).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ContractCallError);
      expect(error).toMatchObject({
        message: 'positions failed: socket hang up',
        context: { method: 'positions', tokenId: 9n },
      });
    });
  });

  describe('getPool', () => {
    it('should return the pool address from the factory', async () => {
      transport.call.mockResolvedValue(
        encodeFunctionResult({ abi: FACTORY_ABI, functionName: 'getPool', result: POOL })
      );

      await expect(gateway.getPool(TOKEN_0, TOKEN_1, 3000)).resolves.toBe(POOL);
      expect(transport.call).toHaveBeenCalledWith(FACTORY, expect.any(String));
    });

    it('should throw PoolNotFoundError for the zero address', async () => {
      transport.call.mockResolvedValue(
        encodeFunctionResult({ abi: FACTORY_ABI, functionName: 'getPool', result: zeroAddress })
      );

      await expect(gateway.getPool(TOKEN_0, TOKEN_1, 500)).rejects.toBeInstanceOf(
        PoolNotFoundError
      );
    });
  });

  describe('getTransferLogs', () => {
    it('should filter Transfer events by recipient up to the latest block', async () => {
      transport.getBlockNumber.mockResolvedValue(5000n);

      await gateway.getTransferLogs(OWNER);

      expect(transport.getLogs).toHaveBeenCalledWith({
        address: POSITION_MANAGER,
        topics: [TRANSFER_EVENT_TOPIC, null, padHex(OWNER, { size: 32 })],
        fromBlock: 0n,
        toBlock: 5000n,
      });
    });

    it('should use the keccak256 Transfer signature as topic0', () => {
      expect(TRANSFER_EVENT_TOPIC).toBe(
        '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef'
      );
    });
  });

  describe('write builders', () => {
    const mintParams = {
      token0: TOKEN_0,
      token1: TOKEN_1,
      fee: 3000,
      tickLower: -540,
      tickUpper: 480,
      amount0Desired: 1000n,
      amount1Desired: 2000n,
      amount0Min: 700n,
      amount1Min: 1400n,
      recipient: OWNER,
      deadline: 1_700_003_600n,
    };

    it('should build a mint intent with the configured gas multiplier', async () => {
      const intent = await gateway.buildMint(mintParams);

      expect(intent).toEqual({
        to: POSITION_MANAGER,
        method: 'mint',
        args: [mintParams],
        data: encodeFunctionData({
          abi: POSITION_MANAGER_ABI,
          functionName: 'mint',
          args: [mintParams],
        }),
        value: 0n,
        gas: 600_000n,
        gasPrice: 150n,
        chainId: 137,
      });
    });

    it('should let a per-call multiplier override the configured one', async () => {
      const intent = await gateway.buildBurn(3n, { gasPriceMultiplier: 2 });

      expect(intent.gasPrice).toBe(200n);
      expect(intent.gas).toBe(150_000n);
      expect(intent.args).toEqual([3n]);
    });

    it('should address approve intents to the token contract', async () => {
      const intent = await gateway.buildApprove(TOKEN_0, POSITION_MANAGER, 1000n);

      expect(intent.to).toBe(TOKEN_0);
      expect(intent.method).toBe('approve');
      expect(intent.gas).toBe(80_000n);
      expect(intent.args).toEqual([POSITION_MANAGER, 1000n]);
    });

    it('should never sign or send', async () => {
      await gateway.buildCollect({
        tokenId: 1n,
        recipient: OWNER,
        amount0Max: 1n,
        amount1Max: 1n,
      });

      expect(transport.sendRaw).not.toHaveBeenCalled();
      expect(transport.getTransactionCount).not.toHaveBeenCalled();
    });
  });
});
