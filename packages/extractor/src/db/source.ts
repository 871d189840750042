import { sql, type SQL } from 'drizzle-orm';
import pino from 'pino';
import { getDb, type DrizzleDb } from './client';
import type { RowSource, SourceRow } from '../extraction/types';

const logger = pino();

// ctid breaks ties so repeated orderBy values keep a stable position across pages
export function pageQuery(table: string, orderBy: string, limit: number, offset: number): SQL {
  return sql`
    SELECT * FROM ${sql.identifier(table)}
    ORDER BY ${sql.identifier(orderBy)}, ctid
    LIMIT ${limit} OFFSET ${offset}
  `;
}

/** Reads a table page by page with LIMIT/OFFSET, ordered by `orderBy`. */
export class PostgresRowSource implements RowSource {
  constructor(
    readonly name: string,
    private readonly orderBy: string,
    private readonly db: DrizzleDb = getDb(),
  ) {}

  async *pages(pageSize: number): AsyncGenerator<SourceRow[]> {
    let offset = 0;
    let pageCount = 0;

    while (true) {
      const result = await this.db.execute<SourceRow>(pageQuery(this.name, this.orderBy, pageSize, offset));

      pageCount++;
      logger.debug({ table: this.name, pageCount, rows: result.rows.length }, 'Source page fetched');

      if (result.rows.length > 0) yield result.rows;
      if (result.rows.length < pageSize) break;
      offset += pageSize;
    }
  }
}
