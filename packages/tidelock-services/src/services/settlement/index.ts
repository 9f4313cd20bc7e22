export { UnstakeSettlementEngine } from './unstake-settlement-engine.js';
export type {
  UnstakeSettlementEngineDependencies,
  QuoteExitInput,
} from './unstake-settlement-engine.js';
