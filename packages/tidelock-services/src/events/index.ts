/**
 * Ledger Domain Events
 */

export * from './types.js';
export { createLedgerEvent, InMemoryEventPublisher } from './publisher.js';
export type {
  CreateLedgerEventInput,
  LedgerEventHandler,
  LedgerEventPublisher,
} from './publisher.js';
