/**
 * Record deduplication
 *
 * Generic records are keyed by canonical JSON: object keys sorted at every
 * depth, array order kept. Servers are keyed by (host, port, database_name).
 */
import { type ExtractionRecord, type JsonValue } from '@/types/extraction';
import { type ServerInfo } from '@/types/specification';

/**
 * Stable stringification with sorted object keys
 */
export const canonicalJson = (value: JsonValue): string => {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
};

/**
 * Keep the first occurrence of every structurally distinct record
 */
export const deduplicateRecords = <T extends ExtractionRecord>(records: T[]): T[] => {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = canonicalJson(record);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

/**
 * Case-insensitive (host, port, database_name) key, or null when none is set
 */
export const serverKey = (server: ServerInfo): string | null => {
  const host = (server.host ?? '').trim().toLowerCase();
  const port = (server.port ?? '').trim().toLowerCase();
  const database = (server.database_name ?? '').trim().toLowerCase();
  if (!host && !port && !database) {
    return null;
  }
  return `${host}:${port}:${database}`;
};

/**
 * Drop servers whose key was already seen, keeping the earliest.
 * Keyless servers are kept when they list hosts, ports or endpoints, or preserve an
 * unparsable output, deduplicated structurally.
 */
export const deduplicateServers = (servers: ServerInfo[]): ServerInfo[] => {
  const seen = new Set<string>();
  const deduplicated: ServerInfo[] = [];

  for (const server of servers) {
    const key = serverKey(server);
    if (key === null) {
      const hasLists = server.hosts.length > 0 || server.ports.length > 0 || server.endpoints.length > 0;
      const preserved = server.configuration.parsing_error === true;
      if (!hasLists && !preserved) {
        continue;
      }
      const structural = `lists:${canonicalJson({
        hosts: server.hosts,
        ports: server.ports,
        endpoints: server.endpoints,
        configuration: server.configuration,
      })}`;
      if (seen.has(structural)) {
        continue;
      }
      seen.add(structural);
    } else {
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
    }
    deduplicated.push(server);
  }

  return deduplicated;
};

/**
 * Order-preserving string dedup
 */
export const uniqueStrings = (values: string[]): string[] => [...new Set(values)];
