/**
 * Ledger Transactions
 *
 * Every externally triggered ledger operation runs to completion inside one
 * transaction. Components record an undo step for each mutation they make
 * (ledger state and collaborator calls alike); if any later step throws,
 * the undo steps run in reverse order and the ledger is left exactly as it
 * was before the call. Events are buffered and published only on commit.
 */

import { ReentrantCallError } from '@tidelock/shared';
import { createServiceLogger, log } from '../logging/index.js';
import type { ServiceLogger } from '../logging/index.js';
import type { LedgerEvent, LedgerEventPublisher } from '../events/index.js';

export type UndoStep = () => void;

interface JournalEntry {
  label: string;
  undo: UndoStep;
}

/**
 * A single in-flight ledger operation
 */
export class LedgerTransaction {
  private readonly journal: JournalEntry[] = [];
  private readonly buffered: LedgerEvent[] = [];

  constructor(public readonly operation: string) {}

  /**
   * Register how to revert a mutation that has just been applied
   */
  onRollback(label: string, undo: UndoStep): void {
    this.journal.push({ label, undo });
  }

  /**
   * Queue an event for publication on commit
   */
  emit(event: LedgerEvent): void {
    this.buffered.push(event);
  }

  get undoSteps(): number {
    return this.journal.length;
  }

  get events(): readonly LedgerEvent[] {
    return this.buffered;
  }

  /**
   * Run every undo step, newest first.
   *
   * @returns Labels and errors of undo steps that failed
   */
  rollback(): Array<{ label: string; error: unknown }> {
    const failures: Array<{ label: string; error: unknown }> = [];
    for (let i = this.journal.length - 1; i >= 0; i--) {
      const entry = this.journal[i];
      if (entry === undefined) continue;
      try {
        entry.undo();
      } catch (error) {
        failures.push({ label: entry.label, error });
      }
    }
    this.journal.length = 0;
    this.buffered.length = 0;
    return failures;
  }
}

export interface TransactionManagerDependencies {
  /** Receives the events of committed transactions */
  publisher: LedgerEventPublisher;
}

/**
 * Runs ledger operations one at a time with all-or-nothing semantics
 */
export class TransactionManager {
  private readonly publisher: LedgerEventPublisher;
  private readonly logger: ServiceLogger;
  private current: LedgerTransaction | null = null;

  constructor(dependencies: TransactionManagerDependencies) {
    this.publisher = dependencies.publisher;
    this.logger = createServiceLogger('TransactionManager');
  }

  /**
   * The transaction in flight, if any
   */
  get active(): LedgerTransaction | null {
    return this.current;
  }

  /**
   * Record an undo step on the active transaction.
   * Outside a transaction (direct component use) there is nothing to undo.
   */
  record(label: string, undo: UndoStep): void {
    this.current?.onRollback(label, undo);
  }

  /**
   * Execute an operation atomically.
   *
   * @param operation - Operation name, used for logs and event metadata
   * @param fn - The operation body
   * @param beforeCommit - Runs after the body and may still abort (invariant checks)
   * @throws ReentrantCallError when called while another operation is in flight
   */
  execute<T>(operation: string, fn: (tx: LedgerTransaction) => T, beforeCommit?: () => void): T {
    if (this.current !== null) {
      throw new ReentrantCallError(operation, this.current.operation);
    }

    const tx = new LedgerTransaction(operation);
    this.current = tx;

    let result: T;
    try {
      result = fn(tx);
      beforeCommit?.();
    } catch (error) {
      const undoSteps = tx.undoSteps;
      const failures = tx.rollback();
      this.current = null;
      log.operationRolledBack(this.logger, operation, undoSteps, error);

      if (failures.length > 0) {
        this.logger.error(
          { operation, failedSteps: failures.map((f) => f.label) },
          'Ledger rollback incomplete'
        );
        throw new AggregateError(
          [error, ...failures.map((f) => f.error)],
          `${operation} failed and ${failures.length} undo step(s) could not be applied`
        );
      }
      throw error;
    }

    this.current = null;
    const events = [...tx.events];
    log.operationCommitted(this.logger, operation, events.length);
    this.publisher.publish(events);
    return result;
  }
}
