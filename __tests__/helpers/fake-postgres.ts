/**
 * In-process stand-in for the weather_data table.
 *
 * Understands exactly the statements the loader sends: BEGIN, COMMIT, ROLLBACK,
 * SELECT 1 and the weather_data insert. Enforces the (obs_date, city) unique key
 * and only makes inserts visible on COMMIT.
 */

import { WEATHER_COLUMNS, type Connect, type SqlClient, type WeatherColumn } from '../../src/db.js';

export type StoredRow = Record<WeatherColumn, unknown>;

export class FakeWeatherTable {
  readonly rows: StoredRow[] = [];
  readonly statements: string[] = [];
  connectCalls = 0;
  openClients = 0;
  rollbacks = 0;
  /** Number of upcoming connect() calls that fail. */
  failConnects = 0;
  /** Number of upcoming inserts that fail. */
  failInserts = 0;

  readonly connect: Connect = async () => {
    this.connectCalls++;
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }
    this.openClients++;
    return this.createClient();
  };

  private createClient(): SqlClient {
    let pending: StoredRow[] | null = null;
    let closed = false;

    return {
      query: async (text, values = []) => {
        if (closed) {
          throw new Error('Client was closed and is not queryable');
        }
        const statement = text.trim().replace(/\s+/g, ' ');
        this.statements.push(statement);

        if (statement === 'BEGIN') {
          pending = [];
          return { rowCount: null };
        }
        if (statement === 'COMMIT') {
          this.rows.push(...(pending ?? []));
          pending = null;
          return { rowCount: null };
        }
        if (statement === 'ROLLBACK') {
          this.rollbacks++;
          pending = null;
          return { rowCount: null };
        }
        if (statement === 'SELECT 1') {
          return { rowCount: 1 };
        }
        if (statement.startsWith('INSERT INTO weather_data')) {
          if (this.failInserts > 0) {
            this.failInserts--;
            throw new Error('terminating connection due to administrator command');
          }
          const row = toRow(values);
          const visible = [...this.rows, ...(pending ?? [])];
          if (visible.some((r) => r.obs_date === row.obs_date && r.city === row.city)) {
            return { rowCount: 0 };
          }
          if (pending) {
            pending.push(row);
          } else {
            this.rows.push(row);
          }
          return { rowCount: 1 };
        }
        throw new Error(`Unexpected statement: ${statement}`);
      },
      end: async () => {
        if (!closed) {
          closed = true;
          this.openClients--;
        }
      },
    };
  }
}

function toRow(values: unknown[]): StoredRow {
  const at = (column: WeatherColumn) => values[WEATHER_COLUMNS.indexOf(column)];
  return {
    date: at('date'),
    obs_date: at('obs_date'),
    city: at('city'),
    temp_kelvin: at('temp_kelvin'),
    temp_celsius: at('temp_celsius'),
    humidity: at('humidity'),
    description: at('description'),
    data_quality: at('data_quality'),
  };
}
