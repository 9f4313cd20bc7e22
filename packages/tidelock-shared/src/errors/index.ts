export * from './ledger-errors.js';
