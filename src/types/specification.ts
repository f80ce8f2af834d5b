/**
 * Output document types
 *
 * Key names with spaces mirror the exported JSON artifact.
 */
/* eslint-disable @typescript-eslint/naming-convention */
import { type JsonObject, type JsonValue } from '@/types/extraction';

/**
 * Canonical server entry
 */
export interface ServerInfo {
  host?: string;
  port?: string;
  database_name?: string;
  hosts: string[];
  ports: string[];
  endpoints: string[];
  configuration: Record<string, JsonValue>;
}

export type DataType = 'string' | 'integer' | 'boolean' | 'datetime' | 'decimal' | 'json';

export interface FieldInformation {
  column_name: string;
  data_type: DataType;
  /** Comma-joined sorted operations, e.g. 'CREATE,READ' */
  CRUD: string;
}

export interface TableDefinition {
  'Field Information': FieldInformation[];
}

/**
 * Tables of one source file, keyed by file then table name
 */
export type TableInformationEntry = Record<string, Record<string, TableDefinition>>;

export interface InvalidSqlQuery {
  source_file: string;
  query: string;
  reason: string;
}

export interface DatabaseSpecification {
  'Table Information': TableInformationEntry[];
  SQL_QUERIES: string[];
  Invalid_SQL_Queries: InvalidSqlQuery[];
}

/**
 * Application metadata remapped from the metadata service
 */
export interface ApplicationMetadata {
  Information: {
    Name: string;
    Type: string;
    'Central ID': string;
    'Company Platform': string;
    'Tech Platform': string;
  };
  Architecture: {
    'Target Production Environment': string;
    'Hosting Environment': string;
    'Internet Facing': 'Yes' | 'No';
  };
  Risk: {
    'Data Classification': string;
  };
  Regulatory: {
    'Sensitive Data Elements (SDE) / Personally Identifiable Information (PII)': 'Yes' | 'No';
  };
}

export interface CoverageSummary {
  percentage: number;
  areas_found: number;
  total_areas: number;
  areas: Record<string, boolean>;
}

export interface ExtractionSummary {
  codebase: string;
  status: 'completed' | 'no_documents';
  chunks_processed: number;
  statistics: {
    server_entries: number;
    tables: number;
    sql_queries: number;
    invalid_sql_queries: number;
    api_endpoints: number;
    dependencies: number;
  };
  coverage: CoverageSummary;
  /** Set when the final LLM transformation ran */
  refinement?: 'applied' | 'fallback';
}

/**
 * Final specification document for one codebase
 */
export interface SpecificationDocument {
  extraction_metadata: {
    run_id: string;
    extraction_timestamp: string;
    codebase: string;
    extraction_type: string;
  };
  Application: ApplicationMetadata | Record<string, never>;
  'Server Information': ServerInfo[];
  'Database Information': DatabaseSpecification;
  'API Endpoints': string[];
  Dependencies: string[];
  /** LLM-restructured database view, present when refinement succeeded */
  'Refined Database Information'?: JsonObject;
  summary: ExtractionSummary;
}

export type BatchStatus = 'completed' | 'failed';

/**
 * One codebase's result within a batch run
 */
export interface BatchResult {
  codebase: string;
  Application: ApplicationMetadata | Record<string, never>;
  ServerInfo: ServerInfo[];
  DatabaseSpecification: DatabaseSpecification;
  status: BatchStatus;
  /** Full document the result was derived from */
  document: SpecificationDocument;
  /** Commit sink outcome, when a sink is configured */
  commit?: { ok: boolean; message: string };
}
