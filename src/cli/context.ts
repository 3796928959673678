import { ManagerConfig } from '../types';
import { BalanceOracle } from '../services/balanceOracle';
import { ContractGateway } from '../services/contractGateway';
import { LiquidityOrchestrator } from '../services/liquidityOrchestrator';
import { PositionRegistry } from '../services/positionRegistry';
import { JsonRpcTransport } from '../services/rpcTransport';
import { TransactionExecutor } from '../services/transactionExecutor';
import { WalletSigner } from '../services/walletSigner';
import { ConfigError } from '../utils/errors';

export interface ReadContext {
  config: ManagerConfig;
  gateway: ContractGateway;
  balances: BalanceOracle;
  registry: PositionRegistry;
}

export interface WriteContext extends ReadContext {
  signer: WalletSigner;
  orchestrator: LiquidityOrchestrator;
}

export function createReadContext(config: ManagerConfig): ReadContext {
  const transport = new JsonRpcTransport(config.rpcUrl);
  const gateway = new ContractGateway(transport, config);

  return {
    config,
    gateway,
    balances: new BalanceOracle(gateway),
    registry: new PositionRegistry(gateway, undefined, config.readConcurrency),
  };
}

export function createWriteContext(config: ManagerConfig): WriteContext {
  if (!config.privateKey) {
    throw new ConfigError('PRIVATE_KEY is required for this command');
  }

  const transport = new JsonRpcTransport(config.rpcUrl);
  const gateway = new ContractGateway(transport, config);
  const signer = new WalletSigner(config.privateKey);
  const executor = new TransactionExecutor(transport, signer, config);
  const balances = new BalanceOracle(gateway);

  return {
    config,
    gateway,
    balances,
    registry: new PositionRegistry(gateway, undefined, config.readConcurrency),
    signer,
    orchestrator: new LiquidityOrchestrator(gateway, balances, executor, config),
  };
}
