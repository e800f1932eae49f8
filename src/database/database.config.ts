import { PoolConfig } from 'pg';

export interface DatabaseConfigProps {
  readonly connectionString?: string;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  readonly ssl: boolean;
  readonly max: number;
  readonly idleTimeoutMillis: number;
  readonly connectionTimeoutMillis: number;
  readonly statementTimeoutMillis: number;
  readonly applicationName: string;
}

const DEFAULT_APPLICATION_NAME = 'coupon-integrity-engine';

export class DatabaseConfig {
  constructor(private readonly props: DatabaseConfigProps) {}

  static fromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    return new DatabaseConfig({
      connectionString: env.DATABASE_URL || undefined,
      host: env.POSTGRES_HOST ?? 'localhost',
      port: DatabaseConfig.parseInteger(env.POSTGRES_PORT, 5432, 'POSTGRES_PORT'),
      user: env.POSTGRES_USER ?? 'postgres',
      password: env.POSTGRES_PASSWORD ?? '',
      database: env.POSTGRES_DB ?? 'postgres',
      ssl: env.POSTGRES_SSL === 'true',
      max: DatabaseConfig.parseInteger(env.POSTGRES_POOL_MAX, 10, 'POSTGRES_POOL_MAX'),
      idleTimeoutMillis: DatabaseConfig.parseInteger(env.POSTGRES_IDLE_TIMEOUT, 30_000, 'POSTGRES_IDLE_TIMEOUT'),
      connectionTimeoutMillis: DatabaseConfig.parseInteger(
        env.POSTGRES_CONNECTION_TIMEOUT,
        5_000,
        'POSTGRES_CONNECTION_TIMEOUT',
      ),
      // Redemption runs inside a pump transaction; a stuck query must not hold it.
      statementTimeoutMillis: DatabaseConfig.parseInteger(
        env.POSTGRES_STATEMENT_TIMEOUT,
        10_000,
        'POSTGRES_STATEMENT_TIMEOUT',
      ),
      applicationName: env.POSTGRES_APPLICATION_NAME ?? DEFAULT_APPLICATION_NAME,
    });
  }

  private static parseInteger(
    value: string | undefined,
    fallback: number,
    key: string,
  ): number {
    if (value === undefined || value === '') {
      return fallback;
    }

    const parsed = Number(value);

    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new Error(`Invalid integer value for ${key}: ${value}`);
    }

    return parsed;
  }

  toPoolConfig(): PoolConfig {
    const shared: PoolConfig = {
      ssl: this.props.ssl || undefined,
      max: this.props.max,
      idleTimeoutMillis: this.props.idleTimeoutMillis,
      connectionTimeoutMillis: this.props.connectionTimeoutMillis,
      statement_timeout: this.props.statementTimeoutMillis,
      application_name: this.props.applicationName,
    };

    if (this.props.connectionString) {
      return { ...shared, connectionString: this.props.connectionString };
    }

    return {
      ...shared,
      host: this.props.host,
      port: this.props.port,
      user: this.props.user,
      password: this.props.password,
      database: this.props.database,
    };
  }

  /** Connection target without credentials, for logs. */
  describe(): string {
    if (this.props.connectionString) {
      const url = new URL(this.props.connectionString);
      return `${url.hostname}:${url.port || '5432'}${url.pathname}`;
    }
    return `${this.props.host}:${this.props.port}/${this.props.database}`;
  }
}
