export { LedgerTransaction, TransactionManager } from './ledger-transaction.js';
export type { UndoStep, TransactionManagerDependencies } from './ledger-transaction.js';
