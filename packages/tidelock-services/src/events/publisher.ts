/**
 * Ledger Event Publisher
 *
 * Builds ledger event envelopes and fans them out to in-process
 * subscribers. The staking ledger hands events to a publisher only after
 * the producing operation has committed.
 */

import { createId } from '@paralleldrive/cuid2';
import { createServiceLogger } from '../logging/index.js';
import type { ServiceLogger } from '../logging/index.js';
import type {
  LedgerEvent,
  LedgerEventType,
  LedgerEntityType,
  LedgerEventPayloadMap,
} from './types.js';

// ============================================================
// Event Builder
// ============================================================

/**
 * Input for creating a new ledger event
 */
export interface CreateLedgerEventInput<TType extends LedgerEventType> {
  type: TType;
  entityId: string;
  entityType: LedgerEntityType;
  payload: LedgerEventPayloadMap[TType];
  ledgerTime: bigint;
  operation: string;
  caller: string;
}

/**
 * Build a complete ledger event from input
 */
export function createLedgerEvent<TType extends LedgerEventType>(
  input: CreateLedgerEventInput<TType>
): LedgerEvent<LedgerEventPayloadMap[TType]> {
  return {
    id: createId(),
    type: input.type,
    entityId: input.entityId,
    entityType: input.entityType,
    ledgerTime: input.ledgerTime.toString(),
    timestamp: new Date().toISOString(),
    version: 1,
    payload: input.payload,
    metadata: {
      operation: input.operation,
      caller: input.caller,
    },
  };
}

// ============================================================
// Publisher
// ============================================================

export type LedgerEventHandler = (event: LedgerEvent) => void;

/**
 * Destination for committed ledger events
 */
export interface LedgerEventPublisher {
  publish(events: readonly LedgerEvent[]): void;
}

/**
 * In-process publisher
 *
 * Keeps every published event (for inspection and the simulation CLI) and
 * delivers it to subscribers. A throwing subscriber is logged and does not
 * stop delivery to the others: the ledger state is already committed.
 */
export class InMemoryEventPublisher implements LedgerEventPublisher {
  private readonly logger: ServiceLogger;
  private readonly handlers = new Set<LedgerEventHandler>();
  private readonly published: LedgerEvent[] = [];

  constructor() {
    this.logger = createServiceLogger('InMemoryEventPublisher');
  }

  /**
   * Register a handler; returns a function that removes it
   */
  subscribe(handler: LedgerEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  publish(events: readonly LedgerEvent[]): void {
    for (const event of events) {
      this.published.push(event);
      for (const handler of this.handlers) {
        try {
          handler(event);
        } catch (error) {
          this.logger.error(
            { eventId: event.id, eventType: event.type, error: error instanceof Error ? error.message : String(error) },
            'Ledger event handler failed'
          );
        }
      }
    }
  }

  /**
   * Every event published so far, optionally filtered by type
   */
  events(type?: LedgerEventType): LedgerEvent[] {
    return type === undefined
      ? [...this.published]
      : this.published.filter((event) => event.type === type);
  }
}
