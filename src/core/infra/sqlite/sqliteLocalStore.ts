/**
 * Project: Raid Sync
 * File: src/core/infra/sqlite/sqliteLocalStore.ts
 * Summary: LocalStore adapter on better-sqlite3.
 *
 * Statements run synchronously; the async surface matches the port so another
 * adapter can be swapped in. Rows read back are validated against their zod shape.
 */

import Database from 'better-sqlite3';

import {
  ENTITY_REFERENCES,
  ENTITY_TABLES,
  TABLE_KEY_COLUMNS,
  type Cell,
  type ColumnOf,
  type EntityKind,
  type LocalRow,
  type LocalStore,
  type OutboundPatch,
  type OutboundQueueRow,
  type RowFilter,
  type RowKey,
  type TableName,
} from '../../app/ports/localStore';
import { ROW_SCHEMAS, outboundQueueRowSchema } from './rowSchemas';
import { SCHEMA_STATEMENTS, columnsOf } from './schema';

type Params = Record<string, Cell>;

const isCell = (value: unknown): value is Cell =>
  value === null || typeof value === 'string' || typeof value === 'number';

const entriesOf = (record: object): [string, unknown][] => Object.entries(record);

/** better-sqlite3 rejects a parameter object on statements without named parameters. */
const bind = (params: Params): Params[] => (Object.keys(params).length > 0 ? [params] : []);

export type SqliteLocalStoreOptions = {
  /** Database file, or `:memory:`. */
  filename: string;
};

export class SqliteLocalStore implements LocalStore {
  private readonly db: Database.Database;

  private readonly statements = new Map<string, Database.Statement>();

  constructor(options: SqliteLocalStoreOptions) {
    this.db = new Database(options.filename);
    if (options.filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    for (const statement of SCHEMA_STATEMENTS) {
      this.db.exec(statement);
    }
  }

  async upsert<T extends TableName>(table: T, row: LocalRow<T>): Promise<void> {
    this.insertRow(table, row);
  }

  async upsertMany<T extends TableName>(table: T, rows: readonly LocalRow<T>[]): Promise<void> {
    this.db.transaction(() => {
      for (const row of rows) {
        this.insertRow(table, row);
      }
    })();
  }

  async clearScope<T extends TableName>(
    table: T,
    column: ColumnOf<T>,
    value: Cell,
  ): Promise<number> {
    return this.deleteWhere(table, { [column]: value });
  }

  async replaceScope<T extends TableName>(
    table: T,
    column: ColumnOf<T>,
    value: Cell,
    rows: readonly LocalRow<T>[],
  ): Promise<void> {
    this.db.transaction(() => {
      this.deleteWhere(table, { [column]: value });
      for (const row of rows) {
        this.insertRow(table, row);
      }
    })();
  }

  async replaceAll<T extends TableName>(table: T, rows: readonly LocalRow<T>[]): Promise<void> {
    this.db.transaction(() => {
      this.deleteWhere(table, {});
      for (const row of rows) {
        this.insertRow(table, row);
      }
    })();
  }

  async query<T extends TableName>(table: T, filter?: RowFilter<T>): Promise<LocalRow<T>[]> {
    const { clause, params } = this.whereClause(table, filter ? entriesOf(filter) : []);
    const keys: readonly string[] = TABLE_KEY_COLUMNS[table];
    const rows = this.statement(
      `SELECT * FROM ${table}${clause} ORDER BY ${keys.join(', ')}`,
    ).all(...bind(params));

    const schema = ROW_SCHEMAS[table];
    return rows.map((row) => schema.parse(row));
  }

  async delete<T extends TableName>(table: T, key: RowKey<T>): Promise<number> {
    return this.deleteWhere(table, Object.fromEntries(entriesOf(key)));
  }

  async remapEntityId(entity: EntityKind, fromId: number, toId: number): Promise<void> {
    const params = { from_id: fromId, to_id: toId };
    const targets = [ENTITY_TABLES[entity], ...ENTITY_REFERENCES[entity]];

    this.db.transaction(() => {
      for (const { table, column } of targets) {
        this.statement(
          `UPDATE OR REPLACE ${table} SET ${column} = @to_id WHERE ${column} = @from_id`,
        ).run(params);
      }
    })();
  }

  async enqueueOutbound(entry: OutboundQueueRow): Promise<void> {
    this.statement(
      `INSERT INTO outbound_queue (id, action, payload, created_at, status, attempts, last_error)
       VALUES (@id, @action, @payload, @created_at, @status, @attempts, @last_error)`,
    ).run({ ...entry });
  }

  async dequeueOutbound(id: string): Promise<void> {
    this.statement('DELETE FROM outbound_queue WHERE id = @id').run({ id });
  }

  async updateOutbound(id: string, patch: OutboundPatch): Promise<void> {
    const assignments: string[] = [];
    const params: Params = { id };

    if (patch.status !== undefined) {
      assignments.push('status = @status');
      params.status = patch.status;
    }
    if (patch.attempts !== undefined) {
      assignments.push('attempts = @attempts');
      params.attempts = patch.attempts;
    }
    if (patch.last_error !== undefined) {
      assignments.push('last_error = @last_error');
      params.last_error = patch.last_error;
    }

    if (assignments.length === 0) {
      return;
    }

    this.statement(`UPDATE outbound_queue SET ${assignments.join(', ')} WHERE id = @id`).run(
      params,
    );
  }

  async listPendingOutbound(): Promise<OutboundQueueRow[]> {
    return this.statement(
      "SELECT * FROM outbound_queue WHERE status = 'pending' ORDER BY created_at, rowid",
    )
      .all()
      .map((row) => outboundQueueRowSchema.parse(row));
  }

  async listOutbound(): Promise<OutboundQueueRow[]> {
    return this.statement('SELECT * FROM outbound_queue ORDER BY created_at, rowid')
      .all()
      .map((row) => outboundQueueRowSchema.parse(row));
  }

  async close(): Promise<void> {
    this.statements.clear();
    if (this.db.open) {
      this.db.close();
    }
  }

  private statement(sql: string): Database.Statement {
    const cached = this.statements.get(sql);
    if (cached) {
      return cached;
    }

    const prepared = this.db.prepare(sql);
    this.statements.set(sql, prepared);
    return prepared;
  }

  private insertRow(table: TableName, row: object): void {
    const values = new Map(entriesOf(row));
    const columns = columnsOf(table);
    const params: Params = {};

    for (const column of columns) {
      const value = values.get(column);
      if (!isCell(value)) {
        throw new TypeError(`Column ${table}.${column} has no storable value.`);
      }
      params[column] = value;
    }

    this.statement(
      `INSERT OR REPLACE INTO ${table} (${columns.join(', ')}) VALUES (${columns
        .map((column) => `@${column}`)
        .join(', ')})`,
    ).run(params);
  }

  private deleteWhere(table: TableName, conditions: Record<string, unknown>): number {
    const { clause, params } = this.whereClause(table, entriesOf(conditions));
    return this.statement(`DELETE FROM ${table}${clause}`).run(...bind(params)).changes;
  }

  private whereClause(
    table: TableName,
    conditions: [string, unknown][],
  ): { clause: string; params: Params } {
    const known = new Set(columnsOf(table));
    const parts: string[] = [];
    const params: Params = {};

    for (const [column, value] of conditions) {
      if (value === undefined) {
        continue;
      }

      if (!known.has(column)) {
        throw new TypeError(`Unknown column ${table}.${column}.`);
      }

      if (!isCell(value)) {
        throw new TypeError(`Column ${table}.${column} cannot be compared to a non-scalar value.`);
      }

      if (value === null) {
        parts.push(`${column} IS NULL`);
      } else {
        parts.push(`${column} = @${column}`);
        params[column] = value;
      }
    }

    return { clause: parts.length > 0 ? ` WHERE ${parts.join(' AND ')}` : '', params };
  }
}
