export { PositionLedger } from './position-ledger.js';
export type {
  PositionLedgerDependencies,
  CreatePositionInput,
  PositionReduction,
} from './position-ledger.js';
