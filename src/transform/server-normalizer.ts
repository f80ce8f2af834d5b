/**
 * Canonical server entries from heterogeneous extraction records
 */
import { type ExtractionRecord, type JsonObject, type JsonValue } from '@/types/extraction';
import { type ServerInfo } from '@/types/specification';

import { isFallbackRecord } from '@extraction/json-parser';

import { compactKey } from './record-classifier';

const HOST_KEYS = new Set(['host', 'hostname', 'server', 'serverhost', 'dbhost', 'hostaddress']);
const PORT_KEYS = new Set(['port', 'serverport', 'dbport']);
const DATABASE_KEYS = new Set(['databasename', 'database', 'db', 'dbname']);
const HOST_LIST_KEYS = new Set(['hosts', 'servers', 'hostnames']);
const PORT_LIST_KEYS = new Set(['ports']);
const ENDPOINT_KEYS = new Set(['endpoints', 'endpoint', 'urls', 'url', 'baseurl']);
const CONFIG_KEYS = new Set(['config', 'configuration', 'settings']);

const isObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const scalarText = (value: JsonValue): string | null => {
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
};

const textList = (value: JsonValue): string[] => {
  const values = Array.isArray(value) ? value : [value];
  return values.map(scalarText).filter((text): text is string => text !== null);
};

const emptyServer = (): ServerInfo => ({ hosts: [], ports: [], endpoints: [], configuration: {} });

const pushUnique = (list: string[], values: string[]): void => {
  for (const value of values) {
    if (!list.includes(value)) {
      list.push(value);
    }
  }
};

/**
 * A nested object or list of objects describing servers, e.g. `{ "servers": [{ "host": ... }] }`
 */
const nestedServers = (value: JsonValue): JsonObject[] => {
  const candidates = Array.isArray(value) ? value : [value];
  const objects = candidates.filter(isObject);
  return objects.length > 0 && objects.length === candidates.length ? objects : [];
};

const toServer = (record: JsonObject): ServerInfo => {
  const server = emptyServer();

  for (const [key, value] of Object.entries(record)) {
    const compact = compactKey(key);

    if (HOST_KEYS.has(compact) && !Array.isArray(value)) {
      const host = scalarText(value);
      if (host !== null) {
        server.host ??= host;
        continue;
      }
    }
    if (PORT_KEYS.has(compact) && !Array.isArray(value)) {
      const port = scalarText(value);
      if (port !== null) {
        server.port ??= port;
        continue;
      }
    }
    if (DATABASE_KEYS.has(compact) && !Array.isArray(value) && !isObject(value)) {
      const database = scalarText(value);
      if (database !== null) {
        server.database_name ??= database;
        continue;
      }
    }
    if ((HOST_LIST_KEYS.has(compact) || HOST_KEYS.has(compact)) && Array.isArray(value)) {
      pushUnique(server.hosts, textList(value));
      continue;
    }
    if ((PORT_LIST_KEYS.has(compact) || PORT_KEYS.has(compact)) && Array.isArray(value)) {
      pushUnique(server.ports, textList(value));
      continue;
    }
    if (ENDPOINT_KEYS.has(compact) && !isObject(value)) {
      pushUnique(server.endpoints, textList(value));
      continue;
    }
    if (CONFIG_KEYS.has(compact) && isObject(value)) {
      Object.assign(server.configuration, value);
      continue;
    }
    if (key !== 'source_file') {
      server.configuration[key] = value;
    }
  }

  return server;
};

/**
 * Map one server extraction record to canonical entries
 *
 * @returns One entry per described server; fallback records become one entry
 *   with the raw output under `configuration`
 */
export const toServerInfos = (record: ExtractionRecord): ServerInfo[] => {
  if (isFallbackRecord(record)) {
    return [{ ...emptyServer(), configuration: { ...record } }];
  }

  if (Array.isArray(record.items)) {
    return nestedServers(record.items).map(toServer);
  }

  const nestedKey = Object.keys(record).find((key) => {
    const compact = compactKey(key);
    return (
      (compact.includes('server') || compact.includes('database') || compact.includes('connection')) &&
      nestedServers(record[key] ?? null).length > 0
    );
  });
  if (nestedKey !== undefined) {
    const value = record[nestedKey];
    return value === undefined ? [] : nestedServers(value).map(toServer);
  }

  return [toServer(record)];
};
