import pg, { type ClientConfig, type QueryResult, type QueryResultRow } from "pg";
import type { Logger } from "pino";
import type { CredentialProvider } from "./credentials.js";
import { getDatabaseSettings } from "./env.js";
import { StorageError, describeError, toStorageError } from "./errors.js";
import { sanitizeError } from "./logger.js";

export type DbConnection = {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
};

export type SqlClient = DbConnection & {
  connect(): Promise<void>;
  end(): Promise<void>;
};

export type SqlClientFactory = (config: ClientConfig) => SqlClient;

/**
 * Per-invocation access to the database behind the proxy. Every call opens
 * exactly one connection and closes it before returning, on success or failure.
 */
export interface Database {
  withConnection<T>(fn: (conn: DbConnection) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (conn: DbConnection) => Promise<T>): Promise<T>;
}

export function pgClientFactory(config: ClientConfig): SqlClient {
  const client = new pg.Client(config);
  return {
    connect: () => client.connect(),
    end: () => client.end(),
    query: <T extends QueryResultRow>(text: string, params?: unknown[]) => client.query<T>(text, params)
  };
}

export type ProxyDatabaseOptions = {
  credentials: CredentialProvider;
  logger: Logger;
  createClient?: SqlClientFactory;
};

export class ProxyDatabase implements Database {
  private readonly createClient: SqlClientFactory;

  constructor(private readonly options: ProxyDatabaseOptions) {
    this.createClient = options.createClient ?? pgClientFactory;
  }

  async withConnection<T>(fn: (conn: DbConnection) => Promise<T>): Promise<T> {
    const settings = getDatabaseSettings();
    const { username, password } = await this.options.credentials.getCredentials();

    const client = this.createClient({
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: username,
      password,
      connectionTimeoutMillis: settings.connectTimeoutMs,
      ...(settings.ssl ? { ssl: { rejectUnauthorized: true } } : {})
    });

    try {
      await client.connect();
    } catch (error) {
      this.options.logger.error(
        { host: settings.host, database: settings.database, error: sanitizeError(error) },
        "db_connect_failed"
      );
      await this.close(client);
      throw new StorageError("connection_failed", `Failed to connect to database: ${describeError(error)}`, {
        cause: error
      });
    }

    try {
      return await fn(wrapConnection(client));
    } finally {
      await this.close(client);
    }
  }

  async withTransaction<T>(fn: (conn: DbConnection) => Promise<T>): Promise<T> {
    return this.withConnection(async (conn) => {
      await conn.query("BEGIN");
      try {
        const result = await fn(conn);
        await conn.query("COMMIT");
        return result;
      } catch (error) {
        try {
          await conn.query("ROLLBACK");
        } catch (rollbackError) {
          this.options.logger.warn({ error: sanitizeError(rollbackError) }, "db_rollback_failed");
        }
        throw error;
      }
    });
  }

  private async close(client: SqlClient): Promise<void> {
    try {
      await client.end();
    } catch (error) {
      this.options.logger.warn({ error: sanitizeError(error) }, "db_close_failed");
    }
  }
}

function wrapConnection(client: SqlClient): DbConnection {
  return {
    async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) {
      try {
        return await client.query<T>(text, params);
      } catch (error) {
        throw toStorageError(error);
      }
    }
  };
}
