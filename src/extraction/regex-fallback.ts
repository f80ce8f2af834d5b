/**
 * Pattern-based extraction for chunks the LLM produced nothing usable for
 */
import { type ServerInfo } from '@/types/specification';

const API_PATTERNS: readonly RegExp[] = [
  /@(?:Get|Post|Put|Delete|Patch)Mapping\(\s*(?:value\s*=\s*)?["']([^"']+)["']/gi,
  /@RequestMapping\(\s*(?:value\s*=\s*)?["']([^"']+)["']/gi,
  /@Path\(\s*["']([^"']+)["']/gi,
  /\bapp\.(?:get|post|put|delete|patch)\(\s*["'`]([^"'`]+)["'`]/gi,
  /\brouter\.(?:get|post|put|delete|patch)\(\s*["'`]([^"'`]+)["'`]/gi,
  /\bRoute\(\s*["']([^"']+)["']/g,
  /\b(?:GET|POST|PUT|DELETE|PATCH)\s+(\/[\w\-{}/:.]*)/g,
];

const DEPENDENCY_PATTERNS: readonly RegExp[] = [
  /^\s*import\s+(?:static\s+)?([\w.]+)\s*;?\s*$/gm,
  /^\s*from\s+([\w.]+)\s+import\b/gm,
  /\bfrom\s+["']([^"']+)["']/g,
  /\brequire\(\s*["']([^"']+)["']\s*\)/g,
  /\b(?:implementation|compile|api)\s*\(?\s*["']([^"']+)["']/g,
];

const MAVEN_DEPENDENCY =
  /<dependency>[\s\S]*?<groupId>\s*([^<\s]+)\s*<\/groupId>[\s\S]*?<artifactId>\s*([^<\s]+)\s*<\/artifactId>/g;

const DEPENDENCY_NOISE: readonly RegExp[] = [/^[A-Z_]+$/, /^\d+$/, /^[a-z]$/, /^[./]+$/];

const HOST_PATTERN = /\b(?:host|server|endpoint)["'\s]*[=:]["'\s]*([^"'\s,;{}]+)/gi;
const PORT_PATTERN = /\bport["'\s]*[=:]["'\s]*(\d+)/gi;
const URL_PATTERN = /(https?:\/\/[^/\s"'<>{}]+)/g;
const DATABASE_PATTERN = /\bdatabase["'\s]*[=:]["'\s]*([^"'\s,;{}]+)/gi;

const collect = (text: string, patterns: readonly RegExp[]): string[] => {
  const found: string[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const value = match[1]?.trim();
      if (value && !found.includes(value)) {
        found.push(value);
      }
    }
  }
  return found;
};

/**
 * Route paths and URLs declared in source
 */
export const extractApiEndpoints = (text: string): string[] =>
  collect(text, API_PATTERNS).filter((route) => route.startsWith('/') || route.startsWith('http'));

const isDependencyNoise = (name: string): boolean =>
  name.length <= 2 || DEPENDENCY_NOISE.some((pattern) => pattern.test(name));

/**
 * Imported modules and declared build dependencies
 */
export const extractDependencies = (text: string): string[] => {
  const found = collect(text, DEPENDENCY_PATTERNS);
  for (const match of text.matchAll(MAVEN_DEPENDENCY)) {
    const coordinate = `${match[1] ?? ''}:${match[2] ?? ''}`;
    if (!found.includes(coordinate)) {
      found.push(coordinate);
    }
  }
  return found.filter((name) => !isDependencyNoise(name));
};

/**
 * Host, port, URL and database assignments in configuration-like text
 *
 * @returns Server entry, or null when nothing was found
 */
export const extractServerInfo = (text: string): ServerInfo | null => {
  const hosts = collect(text, [HOST_PATTERN]).filter((host) => !host.startsWith('http'));
  const ports = collect(text, [PORT_PATTERN]);
  const endpoints = collect(text, [URL_PATTERN]);
  const databases = collect(text, [DATABASE_PATTERN]);

  if (hosts.length === 0 && ports.length === 0 && endpoints.length === 0 && databases.length === 0) {
    return null;
  }

  const databaseName = databases[databases.length - 1];
  return {
    ...(databaseName !== undefined && { database_name: databaseName }),
    hosts,
    ports,
    endpoints,
    configuration: {},
  };
};
