// packages/catalog/src/db.ts
import { Kysely, MysqlDialect, SqliteDialect } from 'kysely';
import { createPool } from 'mysql2';
import { openSqlJs, SqlJsDatabase } from './sqljs';

// Column types are what the drivers hand back: MySQL returns DECIMAL as a
// string and both drivers return booleans as 0/1. Rows are validated in rows.ts.
type Numeric = number | string;
type Flag = number | boolean;

export interface SchemaNodesTable {
  table_name: string;
  table_type: string | null;
  description: string | null;
}

export interface SchemaEdgesTable {
  from_table: string;
  to_table: string;
  relationship_type: string | null;
  join_column: string | null;
  weight: Numeric | null;
  join_column_description: string | null;
  natural_language_alias: string | null;
  few_shot_example: string | null;
  context: string | null;
}

export interface SchemaIntentsTable { intent_id: number; intent_name: string; description: string | null }
export interface SchemaPerspectivesTable { perspective_id: number; perspective_name: string; description: string | null }
export interface SchemaConceptsTable { concept_id: number; concept_name: string; description: string | null }

export interface SchemaConceptFieldsTable {
  concept_id: number;
  table_name: string;
  field_name: string;
  is_primary: Flag | null;
  table_alias: string | null;
}

export interface SchemaIntentPerspectivesTable {
  intent_id: number;
  perspective_id: number;
  intent_factor_weight: Numeric | null;
}

export interface SchemaPerspectiveConceptsTable {
  perspective_id: number;
  concept_id: number;
  elevation_weight: Numeric | null;
  rationale: string | null;
}

export interface SchemaIntentConceptsTable {
  intent_id: number;
  concept_id: number;
  intent_factor_weight: Numeric;
}

export interface CatalogDatabase {
  schema_nodes: SchemaNodesTable;
  schema_edges: SchemaEdgesTable;
  schema_intents: SchemaIntentsTable;
  schema_perspectives: SchemaPerspectivesTable;
  schema_concepts: SchemaConceptsTable;
  schema_concept_fields: SchemaConceptFieldsTable;
  schema_intent_perspectives: SchemaIntentPerspectivesTable;
  schema_perspective_concepts: SchemaPerspectiveConceptsTable;
  schema_intent_concepts: SchemaIntentConceptsTable;
}

export type CatalogDb = Kysely<CatalogDatabase>;

export type CatalogConnection =
  | { dialect: 'mysql'; uri: string }
  | { dialect: 'sqlite'; path: string };

/**
 * Kysely handle over the catalog. SQLite catalogs are loaded into memory
 * through sql.js when the first query runs.
 */
export function createCatalogDb(conn: CatalogConnection): CatalogDb {
  if (conn.dialect === 'sqlite') {
    const { path } = conn;
    const database = async () => new SqlJsDatabase(await openSqlJs(path));
    return new Kysely<CatalogDatabase>({ dialect: new SqliteDialect({ database }) });
  }
  const pool = createPool({ uri: conn.uri, connectionLimit: 4 });
  return new Kysely<CatalogDatabase>({ dialect: new MysqlDialect({ pool }) });
}
