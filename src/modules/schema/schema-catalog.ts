import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { PipelineError, getErrorMessage } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type { FormatOptions, Schema, SchemaStats, Table } from './types.js';

const logger = createLogger('SCHEMA-CATALOG');

const flag = z.union([z.boolean(), z.string()]).nullish();

const schemaRowSchema = z.object({
  table_name: z.string().nullish(),
  column_name: z.string().nullish(),
  data_type: z.string().nullish(),
  is_nullable: flag,
  is_primary_key: flag,
  target_table: z.string().nullish(),
  target_column: z.string().nullish(),
  table_description: z.string().nullish(),
  column_description: z.string().nullish()
});

const schemaDumpSchema = z.array(schemaRowSchema);

export type SchemaRow = z.infer<typeof schemaRowSchema>;

export interface SchemaSource {
  read(): Promise<unknown>;
}

export class JsonFileSchemaSource implements SchemaSource {
  constructor(private readonly filePath: string) {}

  async read(): Promise<unknown> {
    const raw = await readFile(this.filePath, 'utf8');
    return JSON.parse(raw);
  }
}

function isYes(value: boolean | string | null | undefined): boolean {
  if (typeof value === 'boolean') return value;
  return typeof value === 'string' && value.trim().toUpperCase() === 'YES';
}

function isNullable(value: boolean | string | null | undefined): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim().toUpperCase() !== 'NO';
  return true;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Fold the flat one-row-per-column dump into tables. Rows without a table name
 * are skipped; a repeated column keeps its first definition.
 */
export function buildSchema(rows: SchemaRow[]): Map<string, Table> {
  const tables = new Map<string, Table>();

  for (const row of rows) {
    const tableName = nonEmpty(row.table_name);
    if (!tableName) continue;

    let table = tables.get(tableName);
    if (!table) {
      table = { name: tableName, columns: [], primaryKeys: [], foreignKeys: [] };
      tables.set(tableName, table);
    }

    const tableDescription = nonEmpty(row.table_description);
    if (tableDescription && !table.description) {
      table.description = tableDescription;
    }

    const columnName = nonEmpty(row.column_name);
    if (!columnName) continue;

    if (!table.columns.some((column) => column.name === columnName)) {
      table.columns.push({
        name: columnName,
        type: nonEmpty(row.data_type) ?? 'unknown',
        nullable: isNullable(row.is_nullable),
        description: nonEmpty(row.column_description)
      });
    }

    if (isYes(row.is_primary_key) && !table.primaryKeys.includes(columnName)) {
      table.primaryKeys.push(columnName);
    }

    const targetTable = nonEmpty(row.target_table);
    const targetColumn = nonEmpty(row.target_column);
    if (targetTable && targetColumn) {
      const duplicate = table.foreignKeys.some(
        (fk) => fk.column === columnName && fk.referencesTable === targetTable && fk.referencesColumn === targetColumn
      );
      if (!duplicate) {
        table.foreignKeys.push({ column: columnName, referencesTable: targetTable, referencesColumn: targetColumn });
      }
    }
  }

  return tables;
}

function formatTable(table: Table, options: FormatOptions): string {
  const lines = [`Table: ${table.name}`];

  if (options.includeDescriptions && table.description) {
    lines.push(`  Description: ${table.description}`);
  }

  lines.push('  Columns:');
  for (const column of table.columns) {
    const traits = [column.type, column.nullable ? 'NULL' : 'NOT NULL'];
    if (table.primaryKeys.includes(column.name)) traits.push('PRIMARY KEY');
    const comment = options.includeDescriptions && column.description ? ` -- ${column.description}` : '';
    lines.push(`    - ${column.name} (${traits.join(', ')})${comment}`);
  }

  if (options.includeForeignKeys && table.foreignKeys.length) {
    lines.push('  Foreign Keys:');
    for (const fk of table.foreignKeys) {
      lines.push(`    - ${fk.column} → ${fk.referencesTable}.${fk.referencesColumn}`);
    }
  }

  return lines.join('\n');
}

interface SchemaSnapshot {
  tables: ReadonlyMap<string, Table>;
  byLowerName: ReadonlyMap<string, string>;
  sortedNames: readonly string[];
  loadedAt: Date;
}

/**
 * Read-mostly view of the target schema. The parsed dump is held as an
 * immutable snapshot; `refresh` builds a new one and swaps the reference, so
 * readers never observe a half-built schema.
 */
export class SchemaCatalog {
  private snapshot: SchemaSnapshot | null = null;
  private loading: Promise<SchemaSnapshot> | null = null;

  constructor(private readonly source: SchemaSource) {}

  async tableNames(): Promise<string[]> {
    const snapshot = await this.current();
    return [...snapshot.sortedNames];
  }

  /**
   * Subset of the schema for the given names, matched case-insensitively.
   * Unknown names are logged and ignored.
   */
  async filter(names: readonly string[]): Promise<Schema> {
    const snapshot = await this.current();
    const selected = new Map<string, Table>();
    const missing: string[] = [];

    for (const name of names) {
      const canonical = snapshot.byLowerName.get(name.trim().toLowerCase());
      const table = canonical ? snapshot.tables.get(canonical) : undefined;
      if (canonical && table) {
        selected.set(canonical, table);
      } else {
        missing.push(name);
      }
    }

    if (missing.length) {
      logger.warn('filter', 'MISSING_TABLES', missing.join(', '));
    }
    return selected;
  }

  format(schema: Schema, options: FormatOptions = { includeDescriptions: true, includeForeignKeys: true }): string {
    return [...schema.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((table) => formatTable(table, options))
      .join('\n\n');
  }

  async getTable(name: string): Promise<Table | undefined> {
    const snapshot = await this.current();
    const canonical = snapshot.byLowerName.get(name.trim().toLowerCase());
    return canonical ? snapshot.tables.get(canonical) : undefined;
  }

  async searchTables(keyword: string): Promise<string[]> {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];
    const snapshot = await this.current();
    return snapshot.sortedNames.filter((name) => name.toLowerCase().includes(needle));
  }

  async stats(): Promise<SchemaStats> {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return { totalTables: 0, totalColumns: 0, totalForeignKeys: 0, loadedAt: null };
    }
    let totalColumns = 0;
    let totalForeignKeys = 0;
    for (const table of snapshot.tables.values()) {
      totalColumns += table.columns.length;
      totalForeignKeys += table.foreignKeys.length;
    }
    return { totalTables: snapshot.tables.size, totalColumns, totalForeignKeys, loadedAt: snapshot.loadedAt };
  }

  async refresh(): Promise<SchemaStats> {
    const next = await this.load();
    this.snapshot = next;
    logger.info('refresh', 'SUCCESS', `Tables:${next.tables.size}`);
    return this.stats();
  }

  private async current(): Promise<SchemaSnapshot> {
    if (this.snapshot) return this.snapshot;
    if (!this.loading) {
      this.loading = this.load()
        .then((snapshot) => {
          this.snapshot = snapshot;
          return snapshot;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }

  private async load(): Promise<SchemaSnapshot> {
    const startedAt = Date.now();
    let raw: unknown;
    try {
      raw = await this.source.read();
    } catch (error) {
      throw new PipelineError('Schema dump could not be read', 'CONFIGURATION', getErrorMessage(error));
    }

    const parsed = schemaDumpSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError(
        'Schema dump is malformed',
        'CONFIGURATION',
        parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      );
    }

    const tables = buildSchema(parsed.data);
    const sortedNames = [...tables.keys()].sort((a, b) => a.localeCompare(b));
    const byLowerName = new Map<string, string>();
    for (const name of sortedNames) {
      const key = name.toLowerCase();
      if (!byLowerName.has(key)) byLowerName.set(key, name);
    }

    logger.info('load', 'SUCCESS', `Tables:${tables.size}`, Date.now() - startedAt);
    return { tables, byLowerName, sortedNames, loadedAt: new Date() };
  }
}
