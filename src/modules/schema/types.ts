export interface Column {
  name: string;
  type: string;
  nullable: boolean;
  description?: string;
}

export interface ForeignKey {
  column: string;
  referencesTable: string;
  referencesColumn: string;
}

export interface Table {
  name: string;
  columns: Column[];
  primaryKeys: string[];
  foreignKeys: ForeignKey[];
  description?: string;
}

/** Keyed by the table's case-preserved name. */
export type Schema = ReadonlyMap<string, Table>;

export interface FormatOptions {
  includeDescriptions: boolean;
  includeForeignKeys: boolean;
}

export interface SchemaStats {
  totalTables: number;
  totalColumns: number;
  totalForeignKeys: number;
  loadedAt: Date | null;
}
