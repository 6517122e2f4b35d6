import type { Logger } from 'pino';
import { QueryError } from '../errors.js';
import type { Parameters, QueryResult, SqlConnection } from '../types.js';
import type { RowMapper } from './row-mapper.js';

/**
 * Runs caller-supplied SQL against a connection in one of four shapes.
 * Database errors are logged and re-thrown unchanged.
 */
export class CustomQueries {
  constructor(
    private readonly connection: SqlConnection,
    private readonly logger: Logger,
  ) {}

  /** Every row, mapped and fully materialized. */
  async list<T>(sql: string, parameters: Parameters, mapRow: RowMapper<T>): Promise<T[]> {
    const result = await this.run(sql, parameters);
    return result.rows.map(mapRow);
  }

  /** The first row, or undefined when nothing matched. */
  async single<T>(sql: string, parameters: Parameters, mapRow: RowMapper<T>): Promise<T | undefined> {
    const result = await this.run(sql, parameters);
    const row = result.rows[0];
    return row === undefined ? undefined : mapRow(row);
  }

  /** Statement run for effect; resolves to the affected row count. */
  async nonQuery(sql: string, parameters: Parameters): Promise<number> {
    const result = await this.run(sql, parameters);
    return result.rowCount;
  }

  /** A single value; throws QueryError when the statement returns no row. */
  async scalar<T>(sql: string, parameters: Parameters, mapRow: RowMapper<T>): Promise<T> {
    const result = await this.run(sql, parameters);
    const row = result.rows[0];
    if (row === undefined) {
      throw new QueryError('Scalar query returned no rows', sql);
    }
    return mapRow(row);
  }

  private async run(sql: string, parameters: Parameters): Promise<QueryResult> {
    this.logger.debug({ sql, parameters: Object.keys(parameters) }, 'executing statement');
    try {
      return await this.connection.execute(sql, parameters);
    } catch (err) {
      this.logger.error({ err, sql }, 'statement failed');
      throw err;
    }
  }
}
