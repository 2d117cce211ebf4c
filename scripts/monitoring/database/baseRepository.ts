import format from 'pg-format';
import { Queryable } from './client';

export type DatabaseValue = string | number | boolean | Date | null;

export interface DatabaseField<T> {
  column: string;
  extractor: (obj: T) => DatabaseValue | bigint | undefined;
}

export interface TableConfig {
  name: AllowedTableName;
  conflictFields: readonly string[];
  hasLastUpdated: boolean;
}

const ALLOWED_TABLES = ['collateral_deposited_events', 'collateral_redeemed_events', 'position_states'] as const;

const ALLOWED_TABLES_SET: ReadonlySet<string> = new Set(ALLOWED_TABLES);

export type AllowedTableName = (typeof ALLOWED_TABLES)[number];

export const Transformers = {
  bigIntToString: (value: bigint): string => value.toString(),
  timestampToDate: (timestamp: number): Date => new Date(timestamp * 1000),
};

export class BaseRepository {
  private static readonly BATCH_SIZE = 500;
  private static readonly MAX_PARAMS = 65535; // PostgreSQL limit

  constructor(protected readonly db: Queryable) {}

  async persistRows<T>(tableConfig: TableConfig, rows: T[], fields: DatabaseField<T>[]): Promise<number> {
    if (rows.length === 0) return 0;
    if (fields.length === 0) throw new Error('No fields provided for persistRows');
    if (tableConfig.conflictFields.length === 0) throw new Error('Empty conflictFields in TableConfig');

    this.validateTableName(tableConfig.name);
    this.validateColumnNames(tableConfig.conflictFields);
    this.validateColumnNames(fields.map((f) => f.column));

    const batchSize = Math.min(BaseRepository.BATCH_SIZE, Math.floor(BaseRepository.MAX_PARAMS / fields.length));

    let totalWritten = 0;
    for (let i = 0; i < rows.length; i += batchSize) {
      totalWritten += await this.persistBatch(tableConfig, rows.slice(i, i + batchSize), fields);
    }

    console.log(`> Persisted ${totalWritten}/${rows.length} ${tableConfig.name} rows`);
    return totalWritten;
  }

  private async persistBatch<T>(tableConfig: TableConfig, rows: T[], fields: DatabaseField<T>[]): Promise<number> {
    const quotedTable = format.ident(tableConfig.name);
    const quotedColumns = fields.map((f) => format.ident(f.column)).join(', ');
    const quotedConflictFields = tableConfig.conflictFields.map((field) => format.ident(field)).join(', ');
    const placeholders = rows
      .map((_, rowIndex) => `(${fields.map((_, colIndex) => `$${rowIndex * fields.length + colIndex + 1}`).join(', ')})`)
      .join(', ');

    const query = `INSERT INTO ${quotedTable} (${quotedColumns}) VALUES ${placeholders} ON CONFLICT (${quotedConflictFields}) ${this.conflictClause(tableConfig, fields)}`;

    const params: DatabaseValue[] = [];
    for (const row of rows) {
      for (const field of fields) {
        params.push(this.extractValue(row, field));
      }
    }

    try {
      const result = await this.db.query(query, params);
      return result.rowCount ?? 0;
    } catch (error) {
      console.error(`Error persisting ${tableConfig.name} batch:`, error);
      throw new Error(`Failed to persist ${tableConfig.name}: ${error}`);
    }
  }

  /** Event tables are append-only; state tables overwrite every non-key column. */
  private conflictClause<T>(tableConfig: TableConfig, fields: DatabaseField<T>[]): string {
    if (!tableConfig.hasLastUpdated) return 'DO NOTHING';

    const updateSet = fields
      .filter((f) => !tableConfig.conflictFields.includes(f.column))
      .map((f) => `${format.ident(f.column)} = EXCLUDED.${format.ident(f.column)}`);
    updateSet.push(`${format.ident('last_updated')} = NOW()`);
    return `DO UPDATE SET ${updateSet.join(', ')}`;
  }

  // ***** HELPER FUNCTIONS *****

  protected validateTableName(tableName: string): void {
    if (!ALLOWED_TABLES_SET.has(tableName)) {
      throw new Error(`Table '${tableName}' is not in the allowed list`);
    }
  }

  private validateColumnNames(columnNames: readonly string[]): void {
    const invalidChars = /[^\w$]/;
    for (const column of columnNames) {
      if (invalidChars.test(column) || column.length === 0) {
        throw new Error(`Invalid column name: ${column}`);
      }
    }
  }

  protected extractValue<T>(obj: T, field: DatabaseField<T>): DatabaseValue {
    const value = field.extractor(obj);
    if (value === undefined) return null;
    if (typeof value === 'bigint') return Transformers.bigIntToString(value);
    return value;
  }
}
