export { StakingLedgerService } from './staking-ledger-service.js';
export type {
  StakingLedgerServiceDependencies,
  StakeInput,
  StakeResult,
  ExtendLockResult,
} from './staking-ledger-service.js';
export { AtomicPositionModel, FractionalPositionModel } from './position-models.js';
export type { PositionModelStrategy } from './position-models.js';
export {
  createInMemoryDeployment,
  DEFAULT_BASE_ASSET_ADDRESS,
  DEFAULT_LEDGER_ADDRESS,
} from './in-memory-deployment.js';
export type { InMemoryDeployment, InMemoryDeploymentOptions } from './in-memory-deployment.js';
