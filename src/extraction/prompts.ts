/**
 * Prompts for each extraction kind
 */
import { type ExtractionKind, type ExtractionPrompts } from '@/types/extraction';

export const EXTRACTION_PROMPTS: Record<ExtractionKind, ExtractionPrompts> = {
  server: {
    system:
      'You are an expert system configuration analyzer. Extract server and configuration information from code and config files. Focus on hosts, ports, URLs, service endpoints and connection details.',
    detection:
      "Given the provided code snippet, identify if there are server informations present showing host, port and database information? If none, reply back with 'no'. Else extract the server information. Place in a json with keys 'host', 'port', 'database_name'. Reply with only the JSON. Make sure it's a valid JSON.",
    validation: "Is this valid database server information? If yes, reply with 'yes'. If no, reply with 'no'.",
    query: 'server host port database connection configuration endpoint',
  },
  database: {
    system:
      'You are an expert database analyzer. Extract database-related information from code. Focus on SQL queries, table names, column names, database connections and ORM operations. Only extract what is actually present in the code.',
    detection:
      "Given the provided code snippet, identify if there are database-related configurations, connections, or queries present? If none, reply back with 'no'. Else extract the database information. Place in a json with keys for any database-related information found. Reply with only the JSON. Make sure it's a valid JSON.",
    validation: "Is this valid database information? If yes, reply with 'yes'. If no, reply with 'no'.",
    query: 'database sql query table column entity repository',
  },
  api: {
    system:
      'You are an expert API analyzer. Extract API endpoints and routes from code. Focus on REST endpoints, GraphQL, RPC calls, route definitions and controller mappings.',
    detection:
      'Find all API endpoints in this code and return ONLY a valid JSON array, for example ["GET /api/users", "POST /api/orders", "/graphql"]. Include the HTTP method if available. If no API endpoints are found, return []. Do not include explanations, comments, or markdown formatting.',
    query: 'api route controller service endpoint',
  },
  dependencies: {
    system:
      'You are an expert dependency analyzer. Extract dependencies and imports from code. Focus on external libraries, frameworks, services, modules and packages.',
    detection:
      'Extract all dependencies from this code and return ONLY a valid JSON array, for example ["spring-boot-starter-web", "postgresql", "redis"]. If no dependencies are found, return []. Do not include explanations, comments, or markdown formatting.',
    query: 'import dependency library framework package',
  },
};

/**
 * System prompt for the final restructuring of a database specification
 */
export const REFINEMENT_SYSTEM_PROMPT =
  'You are a database documentation expert. You receive a database specification extracted from source code and return the same information restructured and cleaned.';

export const REFINEMENT_USER_PROMPT =
  'Restructure the provided database specification. Merge tables that refer to the same entity, give every column a precise data type and CRUD value, and keep every SQL query. Reply with only valid JSON using the keys "Table Information", "SQL_QUERIES" and "Invalid_SQL_Queries".';
