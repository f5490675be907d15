import pg from 'pg';
import dotenv from 'dotenv';
dotenv.config();

/**
 * The slice of a pg client the query classes rely on. Both `pg.Pool` and `pg.PoolClient` satisfy it,
 * which lets tests hand in an in-process fake.
 */
export interface DBQueryClient {
  query(text: string, values?: unknown[]): Promise<Pick<pg.QueryResult, 'rows' | 'rowCount'>>;
}

export interface DBPoolClient extends DBQueryClient {
  release(): void;
}

/**
 * What handlers need from `pg.Pool` to run a transaction on a dedicated client.
 */
export interface DBPool extends DBQueryClient {
  connect(): Promise<DBPoolClient>;
}

class DBClient {
  private poolInstance: pg.Pool;

  constructor() {
    this.poolInstance = new pg.Pool({
      user: process.env.DB_USER,
      host: process.env.DB_HOST,
      database: process.env.DB_NAME,
      password: process.env.DB_PASS,
      port: parseInt(process.env.DB_PORT || '5432'),
      idleTimeoutMillis: 3000
    });
  }

  get pool() {
    return this.poolInstance;
  }
}

export const dbClient = new DBClient();

export class Conn {
  get pool() {
    return dbClient.pool;
  }
}
