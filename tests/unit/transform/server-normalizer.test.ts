/**
 * Unit tests for server entry normalization
 */

import { describe, expect, it } from '@jest/globals';

import { fallbackRecord } from '@extraction/json-parser';
import { toServerInfos } from '@transform/server-normalizer';

describe('toServerInfos', () => {
  it('should map scalar keys and keep the rest as configuration', () => {
    expect(toServerInfos({ host: 'db.local', port: 5432, database_name: 'orders', username: 'app' })).toEqual([
      {
        host: 'db.local',
        port: '5432',
        database_name: 'orders',
        hosts: [],
        ports: [],
        endpoints: [],
        configuration: { username: 'app' },
      },
    ]);
  });

  it('should collect host, port and endpoint lists without duplicates', () => {
    expect(toServerInfos({ hosts: ['a', 'b', 'a'], ports: [80, 443], endpoints: 'https://x.example' })).toEqual([
      { hosts: ['a', 'b'], ports: ['80', '443'], endpoints: ['https://x.example'], configuration: {} },
    ]);
  });

  it('should merge nested configuration and drop the source file', () => {
    expect(toServerInfos({ host: 'a', config: { timeout: 30 }, source_file: 'app.yml' })).toEqual([
      { host: 'a', hosts: [], ports: [], endpoints: [], configuration: { timeout: 30 } },
    ]);
  });

  it('should expand item lists and nested server lists', () => {
    expect(toServerInfos({ items: [{ host: 'a' }, { host: 'b', port: '80' }] })).toHaveLength(2);
    expect(toServerInfos({ servers: [{ hostname: 'a', db_port: 1 }] })).toEqual([
      { host: 'a', port: '1', hosts: [], ports: [], endpoints: [], configuration: {} },
    ]);
  });

  it('should keep a fallback record under configuration', () => {
    const record = fallbackRecord('host maybe db', 'app.yml');

    expect(toServerInfos(record)).toEqual([{ hosts: [], ports: [], endpoints: [], configuration: record }]);
  });
});
