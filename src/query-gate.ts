// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Query Gate
 *
 * Keeps at most one query in flight per interface. Submitting a new query
 * aborts the previous one; its result is reported as superseded and must
 * not be applied.
 */

import { QueryCancelledError } from './errors.js';

export type QueryOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'superseded' }
  | { status: 'cancelled' };

interface InFlightQuery {
  id: number;
  controller: AbortController;
}

export class QueryGate {
  private current: InFlightQuery | null = null;
  private lastId = 0;

  /**
   * Run a task, superseding whatever is in flight.
   * Never rejects; failures are reported through the outcome.
   */
  async submit<T>(task: (signal: AbortSignal) => Promise<T>): Promise<QueryOutcome<T>> {
    this.current?.controller.abort(new QueryCancelledError('Superseded by a newer query'));

    const entry: InFlightQuery = { id: ++this.lastId, controller: new AbortController() };
    this.current = entry;

    let outcome: QueryOutcome<T>;
    try {
      outcome = { status: 'completed', value: await task(entry.controller.signal) };
    } catch (error) {
      outcome = { status: 'failed', error };
    }

    if (this.current !== entry) {
      return { status: 'superseded' };
    }
    this.current = null;
    if (entry.controller.signal.aborted) {
      return { status: 'cancelled' };
    }
    return outcome;
  }

  /**
   * Abort the in-flight query, if any.
   * @returns whether there was one
   */
  cancel(): boolean {
    if (!this.current) return false;
    this.current.controller.abort(new QueryCancelledError());
    return true;
  }

  isBusy(): boolean {
    return this.current !== null;
  }
}
