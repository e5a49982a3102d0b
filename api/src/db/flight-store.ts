/**
 * Flight Store
 * @module db/flight-store
 *
 * Boundary of the persistent store as seen by the health subsystem: a
 * connectivity check and one cheap count query.
 */

import type { QueryResult, QueryResultRow } from 'pg';
import { query as poolQuery } from './connection.js';

export interface FlightStore {
  /** Resolves when the store accepts queries; rejects otherwise */
  ping(): Promise<void>;
  countFlights(): Promise<number>;
}

export type QueryFn = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<QueryResult<T>>;

interface CountRow {
  count: number;
}

export class PgFlightStore implements FlightStore {
  private readonly query: QueryFn;

  constructor(query: QueryFn = poolQuery) {
    this.query = query;
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1 AS health_check');
  }

  async countFlights(): Promise<number> {
    const result = await this.query<CountRow>('SELECT COUNT(*)::int AS count FROM flights');
    return result.rows[0]?.count ?? 0;
  }
}
