import { uniq } from "lodash";
import { Address, decodeEventLog } from "viem";
import { POSITION_MANAGER_ABI } from "../abis";
import { LogEntry, Position, PositionClassification } from "../types";
import { toError } from "../utils/errors";
import { Logger, getLogger } from "../utils/Logger";
import { ParallelQueue } from "../utils/ParallelQueue";
import { isSameAddress } from "../utils/tokenHelper";
import { IContractGateway } from "./contractGateway";

const DEFAULT_READ_CONCURRENCY = 8;

export function isTickInRange(
  position: Pick<Position, "tickLower" | "tickUpper">,
  currentTick: number
): boolean {
  return position.tickLower <= currentTick && currentTick <= position.tickUpper;
}

/**
 * Read-only discovery and classification of a wallet's positions.
 * Nothing is cached: every call reads the chain again.
 */
export class PositionRegistry {
  private readonly queue: ParallelQueue;

  constructor(
    private readonly gateway: IContractGateway,
    private readonly logger: Logger = getLogger(module),
    readConcurrency = DEFAULT_READ_CONCURRENCY
  ) {
    this.queue = new ParallelQueue(readConcurrency);
  }

  /**
   * Token IDs ever transferred to `owner`, in log order.
   *
   * Recipient history only: an ID appears once per inbound transfer, and
   * IDs since sent away or burned are still listed. Use
   * `getOwnedPositions` for current holdings.
   */
  async *listPositionIds(owner: Address): AsyncGenerator<bigint> {
    const logs = await this.gateway.getTransferLogs(owner);
    this.logger.debug(`Found ${logs.length} Transfer event(s) to ${owner}`);

    for (const log of logs) {
      const tokenId = this.decodeTokenId(log);
      if (tokenId !== null) {
        yield tokenId;
      }
    }
  }

  /**
   * Detail records keyed by token ID. IDs whose read fails are logged and
   * left out.
   */
  async getPositions(owner: Address): Promise<Map<bigint, Position>> {
    const ids: bigint[] = [];
    for await (const tokenId of this.listPositionIds(owner)) {
      ids.push(tokenId);
    }

    const uniqueIds = uniq(ids);
    if (uniqueIds.length === 0) {
      this.logger.info(`No positions found for wallet: ${owner}`);
      return new Map();
    }

    const results = await this.queue.map(uniqueIds, async (tokenId) => {
      try {
        return await this.gateway.getPosition(tokenId);
      } catch (error) {
        this.logger.warn(
          `Skipping position ${tokenId}: ${toError(error).message}`
        );
        return null;
      }
    });

    const positions = new Map<bigint, Position>();
    for (const position of results) {
      if (position) {
        positions.set(position.tokenId, position);
      }
    }
    return positions;
  }

  async getActivePositions(owner: Address): Promise<Map<bigint, Position>> {
    const positions = await this.getPositions(owner);
    const active = new Map<bigint, Position>();

    for (const [tokenId, position] of positions) {
      if (position.liquidity > 0n) {
        active.set(tokenId, position);
      }
    }

    if (active.size === 0) {
      this.logger.info(`No active positions for wallet: ${owner}`);
    }
    return active;
  }

  /**
   * Positions whose current holder (per `ownerOf`) is `owner`.
   * An ownership read that fails (e.g. burned token) drops the ID.
   */
  async getOwnedPositions(owner: Address): Promise<Map<bigint, Position>> {
    const positions = await this.getPositions(owner);

    const holders = await this.queue.map([...positions.keys()], async (tokenId) => {
      try {
        return { tokenId, holder: await this.gateway.ownerOf(tokenId) };
      } catch (error) {
        this.logger.warn(`Ownership check failed for ${tokenId}: ${toError(error).message}`);
        return { tokenId, holder: null };
      }
    });

    const owned = new Map<bigint, Position>();
    for (const { tokenId, holder } of holders) {
      const position = positions.get(tokenId);
      if (position && holder && isSameAddress(holder, owner)) {
        owned.set(tokenId, position);
      }
    }
    return owned;
  }

  /**
   * Whether the pool's current tick lies within [tickLower, tickUpper].
   * Fails closed: any read error yields false.
   */
  async isInRange(position: Position): Promise<boolean> {
    try {
      const poolAddress = await this.gateway.getPool(
        position.token0,
        position.token1,
        position.fee
      );
      const { tick } = await this.gateway.getSlot0(poolAddress);
      return isTickInRange(position, tick);
    } catch (error) {
      this.logger.error(
        `Cannot determine range of position ${position.tokenId}; reporting out of range: ${
          toError(error).message
        }`
      );
      return false;
    }
  }

  async classify(position: Position): Promise<PositionClassification> {
    if (position.liquidity === 0n) {
      return { status: "closed", inRange: false };
    }
    return { status: "open", inRange: await this.isInRange(position) };
  }

  private decodeTokenId(log: LogEntry): bigint | null {
    const [signature, ...args] = log.topics;
    if (!signature) {
      return null;
    }
    try {
      const { args: decoded } = decodeEventLog({
        abi: POSITION_MANAGER_ABI,
        eventName: "Transfer",
        data: log.data,
        topics: [signature, ...args],
      });
      return decoded.tokenId;
    } catch (error) {
      this.logger.warn(
        `Undecodable Transfer log in tx ${log.transactionHash}: ${toError(error).message}`
      );
      return null;
    }
  }
}
