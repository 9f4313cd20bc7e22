export { LedgerEnvSchema, loadLedgerConfig } from './ledger-config.js';
export type { LedgerConfig } from './ledger-config.js';
