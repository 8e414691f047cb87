// src/services/SessionRegistry.ts
import {
  AlreadyClaimedError,
  RegistryInvariantError,
  SubjectMismatchError,
  WorkerNotFoundError,
} from 'App/errors/CustomError';
import crypto from 'node:crypto';

/* -------------------------------------------------------------------------------------------------
 * Types
 * ------------------------------------------------------------------------------------------------- */

/** Anything a claimed worker can be bound to; Socket.IO sockets satisfy it. */
export interface WorkerConnection {
  disconnect(close?: boolean): unknown;
}

export interface SessionRecord<C extends WorkerConnection = WorkerConnection> {
  id: string;
  /** Subject of the access token that created the worker. */
  subject: string;
  createdAt: number; // epoch ms
  claimed: boolean;
  connection?: C;
}

export interface SessionRegistryOptions {
  /** Lifetime of an unclaimed worker (ms). */
  graceMs?: number;
  now?: () => number;
  generateId?: () => string;
}

export interface RegistryStats {
  total: number;
  claimed: number;
  unclaimed: number;
}

/** 256 random bits, URL-safe. */
export const generateWorkerId = (): string =>
  crypto.randomBytes(32).toString('base64url');

/* -------------------------------------------------------------------------------------------------
 * Implementation
 * ------------------------------------------------------------------------------------------------- */

/**
 * Table of workers: short-lived session records created over HTTP and
 * claimed by exactly one streaming connection.
 *
 * Every operation runs to completion without yielding to the event loop,
 * so create/claim/release/sweep are mutually exclusive for the whole table.
 *
 * Lifecycle:
 * - create() inserts an unclaimed record.
 * - claim() binds a connection, at most once per record.
 * - sweep() drops unclaimed records older than `graceMs`; claimed ones survive.
 * - release() drops a claimed record when its connection ends.
 */
export class SessionRegistry<C extends WorkerConnection = WorkerConnection> {
  private readonly records = new Map<string, SessionRecord<C>>();
  private readonly graceMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionRegistryOptions = {}) {
    this.graceMs = options.graceMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? generateWorkerId;
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Creates an unclaimed worker for `subject` and returns its id.
   * @throws RegistryInvariantError if the generated id is already taken.
   */
  create(subject: string): string {
    const id = this.generateId();
    if (this.records.has(id)) {
      throw new RegistryInvariantError(`Duplicate worker id generated: ${id}`);
    }
    this.records.set(id, {
      id,
      subject,
      createdAt: this.now(),
      claimed: false,
    });
    return id;
  }

  /**
   * Binds `connection` to the worker.
   *
   * Checks run in order: unknown or expired id, subject, prior claim.
   * A rejected claim leaves the record untouched.
   */
  claim(id: string, subject: string, connection: C): SessionRecord<C> {
    const record = this.lookup(id);
    if (!record) {
      throw new WorkerNotFoundError();
    }
    if (record.subject !== subject) {
      throw new SubjectMismatchError();
    }
    if (record.claimed) {
      throw new AlreadyClaimedError();
    }
    record.claimed = true;
    record.connection = connection;
    return record;
  }

  /** Destroys the worker; the caller owns closing its connection. */
  release(id: string): SessionRecord<C> {
    const record = this.records.get(id);
    if (!record) {
      throw new WorkerNotFoundError();
    }
    this.records.delete(id);
    return record;
  }

  /** Returns the worker, or undefined if unknown or expired. */
  get(id: string): SessionRecord<C> | undefined {
    return this.lookup(id);
  }

  /**
   * Drops every unclaimed worker older than the grace period.
   * @returns number of workers removed.
   */
  sweep(now: number = this.now()): number {
    let removed = 0;
    for (const record of this.records.values()) {
      if (this.isExpired(record, now)) {
        this.records.delete(record.id);
        removed++;
      }
    }
    return removed;
  }

  stats(): RegistryStats {
    let claimed = 0;
    for (const record of this.records.values()) {
      if (record.claimed) claimed++;
    }
    return {
      total: this.records.size,
      claimed,
      unclaimed: this.records.size - claimed,
    };
  }

  /** Runs sweep() every `intervalMs` until stopSweeper()/closeAll(). */
  startSweeper(intervalMs: number = 1000): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.log(`[Workers] Recycled ${removed} unclaimed worker(s)`);
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Shutdown: stops the sweeper, disconnects claimed workers, empties the table. */
  closeAll(): void {
    this.stopSweeper();
    const records = [...this.records.values()];
    this.records.clear();
    for (const record of records) {
      record.connection?.disconnect(true);
    }
  }

  private lookup(id: string): SessionRecord<C> | undefined {
    const record = this.records.get(id);
    if (!record) return undefined;
    // expired but not yet swept: gone for every reader
    if (this.isExpired(record, this.now())) {
      this.records.delete(id);
      return undefined;
    }
    return record;
  }

  private isExpired(record: SessionRecord<C>, now: number): boolean {
    return !record.claimed && now - record.createdAt > this.graceMs;
  }
}
