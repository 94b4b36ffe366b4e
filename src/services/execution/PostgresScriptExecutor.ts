/**
 * Postgres Script Executor
 *
 * Fetch secret → connect → BEGIN → run script → COMMIT (ROLLBACK on error) → close.
 * Credentials are cached for the life of the Lambda container.
 *
 * Abort ends the connection, which fails the in-flight query; the server-side
 * statement_timeout cancels the statement itself.
 */

import { Client, ClientConfig } from 'pg';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import { IScriptExecutor } from './IScriptExecutor';
import { ConfigurationError, ScriptExecutionError, errorMessage } from '../../types/DeploymentErrors';
import { Logger } from '../core/Logger';

/** Shape of the RDS-managed secret JSON. */
const DatabaseSecretSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive().default(5432),
  username: z.string().min(1),
  password: z.string(),
  dbname: z.string().min(1).optional(),
});

export type DatabaseSecret = z.infer<typeof DatabaseSecretSchema>;

/** The slice of pg.Client the executor uses. */
export interface SqlClient {
  connect(): Promise<void>;
  query(sql: string): Promise<unknown>;
  end(): Promise<void>;
}

export type PgClientFactory = (config: ClientConfig) => SqlClient;

export interface PostgresScriptExecutorConfig {
  secretsClient: SecretsManagerClient;
  secretName: string;
  logger: Logger;
  /** Override for tests. */
  clientFactory?: PgClientFactory;
  connectionTimeoutMillis?: number;
  /** Server-side statement_timeout; 0 or unset leaves the server default. */
  statementTimeoutMs?: number;
}

export class PostgresScriptExecutor implements IScriptExecutor {
  private secretsClient: SecretsManagerClient;
  private secretName: string;
  private logger: Logger;
  private clientFactory: PgClientFactory;
  private connectionTimeoutMillis: number;
  private statementTimeoutMs: number;
  private cachedSecret?: DatabaseSecret;

  constructor(config: PostgresScriptExecutorConfig) {
    this.secretsClient = config.secretsClient;
    this.secretName = config.secretName;
    this.logger = config.logger;
    this.clientFactory = config.clientFactory ?? ((clientConfig) => new Client(clientConfig));
    this.connectionTimeoutMillis = config.connectionTimeoutMillis ?? 10_000;
    this.statementTimeoutMs = config.statementTimeoutMs ?? 0;
  }

  async execute(content: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ScriptExecutionError('Execution aborted before start');
    }

    const secret = await this.getSecret();
    const client = this.clientFactory({
      host: secret.host,
      port: secret.port,
      user: secret.username,
      password: secret.password,
      database: secret.dbname,
      connectionTimeoutMillis: this.connectionTimeoutMillis,
      ...(this.statementTimeoutMs > 0 ? { statement_timeout: this.statementTimeoutMs } : {}),
    });

    let closing: Promise<void> | undefined;
    const close = (): Promise<void> => {
      if (!closing) {
        closing = client.end().catch((endError: unknown) => {
          this.logger.warn('Failed to close database connection', { error: errorMessage(endError) });
        });
      }
      return closing;
    };
    const onAbort = (): void => {
      this.logger.warn('Script aborted; closing database connection');
      void close();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      try {
        await client.connect();
      } catch (error) {
        throw new ScriptExecutionError(`Database connection failed: ${errorMessage(error)}`, error);
      }

      try {
        await client.query('BEGIN');
        await client.query(content);
        await client.query('COMMIT');
      } catch (error) {
        if (!closing) {
          try {
            await client.query('ROLLBACK');
          } catch (rollbackError) {
            this.logger.warn('Rollback failed', { error: errorMessage(rollbackError) });
          }
        }
        throw new ScriptExecutionError(errorMessage(error), error);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await close();
    }
  }

  private async getSecret(): Promise<DatabaseSecret> {
    if (this.cachedSecret) return this.cachedSecret;

    let secretString: string | undefined;
    try {
      const result = await this.secretsClient.send(
        new GetSecretValueCommand({ SecretId: this.secretName })
      );
      secretString = result.SecretString;
    } catch (error) {
      throw new ScriptExecutionError(
        `Failed to retrieve database secret ${this.secretName}: ${errorMessage(error)}`,
        error
      );
    }

    if (!secretString) {
      throw new ConfigurationError(`Database secret ${this.secretName} has no SecretString`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(secretString);
    } catch {
      throw new ConfigurationError(`Database secret ${this.secretName} is not valid JSON`);
    }

    const parsed = DatabaseSecretSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Database secret ${this.secretName} is malformed: ${parsed.error.issues
          .map((issue) => issue.path.join('.') || issue.message)
          .join(', ')}`
      );
    }

    this.cachedSecret = parsed.data;
    return parsed.data;
  }
}
