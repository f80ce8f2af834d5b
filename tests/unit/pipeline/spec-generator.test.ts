/**
 * End-to-end tests for one codebase, with the LLM and vector store in process
 */

import { describe, expect, it } from '@jest/globals';

import { ErrorLog } from '@utils/error-log';
import { type CodespecConfig } from '@/types/config';
import { type ExtractionKind } from '@/types/extraction';
import { type ApplicationMetadata } from '@/types/specification';
import { type LlmRequest, type LlmResponse } from '@llm/client';
import { EXTRACTION_PROMPTS, REFINEMENT_USER_PROMPT } from '@extraction/prompts';
import { type BackendResult } from '@retrieval/vector-search';
import { createPipelineRuntime } from '@pipeline/context';
import { calculateCoverage, listItems, SpecificationGenerator } from '@pipeline/spec-generator';
import { type MetadataSource } from '@services/metadata-client';

import { FakeLlmClient, FakeVectorBackend, ok, testConfig } from '../../helpers/fakes';

type KindResponder = (kind: ExtractionKind, request: LlmRequest) => LlmResponse;

const kindOf = (request: LlmRequest): ExtractionKind | null => {
  for (const kind of ['server', 'database', 'api', 'dependencies'] as const) {
    if (EXTRACTION_PROMPTS[kind].detection === request.user_prompt) {
      return kind;
    }
  }
  return null;
};

const NOTHING = ok('no');

interface SetupOptions {
  results: BackendResult[];
  respond: KindResponder;
  config?: CodespecConfig;
  refine?: (request: LlmRequest) => LlmResponse;
  metadata?: MetadataSource;
}

const setup = ({ results, respond, config = testConfig(), refine, metadata }: SetupOptions) => {
  const errorLog = new ErrorLog();
  const llm = new FakeLlmClient((request) => {
    if (request.user_prompt === REFINEMENT_USER_PROMPT) {
      return refine ? refine(request) : NOTHING;
    }
    const kind = kindOf(request);
    return kind === null ? NOTHING : respond(kind, request);
  });
  const { context } = createPipelineRuntime(config, {
    errorLog,
    llm,
    backend: new FakeVectorBackend({ orders: results }),
    metadata: metadata ?? null,
    sink: null,
  });
  return { errorLog, llm, generator: new SpecificationGenerator(context) };
};

const result = (content: string, source: string): BackendResult => ({ page_content: content, source });

describe('SpecificationGenerator', () => {
  it('should report a single detected server', async () => {
    const { generator } = setup({
      results: [result('spring.datasource settings for the orders service', 'application.yml')],
      respond: (kind) =>
        kind === 'server' ? ok('{"host":"db1.internal","port":"5432","database_name":"orders"}') : NOTHING,
    });

    const document = await generator.generate('orders');

    expect(document['Server Information']).toEqual([
      {
        host: 'db1.internal',
        port: '5432',
        database_name: 'orders',
        hosts: [],
        ports: [],
        endpoints: [],
        configuration: {},
      },
    ]);
    expect(document.summary.status).toBe('completed');
    expect(document.summary.chunks_processed).toBe(4);
    expect(document.summary.coverage.areas_found).toBe(1);
    expect(document.summary.coverage.percentage).toBe(20);
    expect(document.extraction_metadata.codebase).toBe('orders');
    expect(document.extraction_metadata.extraction_type).toBe('vector_llm');
    expect(document.Application).toEqual({});
  });

  it('should deduplicate identical servers from different chunks', async () => {
    const { generator } = setup({
      results: [result('first settings file for orders', 'a.yml'), result('second settings file for orders', 'b.yml')],
      respond: (kind) =>
        kind === 'server' ? ok('{"host":"db1.internal","port":"5432","database_name":"orders"}') : NOTHING,
    });

    const document = await generator.generate('orders');

    expect(document['Server Information']).toHaveLength(1);
    expect(document.summary.statistics.server_entries).toBe(1);
  });

  it('should add nothing for a chunk the LLM found no database information in', async () => {
    const { generator } = setup({
      results: [result('String q = "SELECT id FROM users WHERE id = 1";', 'UserRepo.java')],
      respond: (kind) => (kind === 'database' ? ok('no database information found') : NOTHING),
    });

    const document = await generator.generate('orders');

    expect(document['Database Information']).toEqual({
      'Table Information': [],
      SQL_QUERIES: [],
      Invalid_SQL_Queries: [],
    });
  });

  it('should keep processing the other chunks after a 404', async () => {
    const names = ['alpha', 'bravo', 'charlie', 'delta', 'echo'];
    const { generator, errorLog } = setup({
      results: names.map((name) => result(`settings block for module ${name}`, `${name}.yml`)),
      respond: (kind, request) => {
        if (kind !== 'server') {
          return NOTHING;
        }
        const name = names.find((candidate) => request.codebase.endsWith(candidate)) ?? 'unknown';
        return name === 'charlie'
          ? { transportStatus: 404, applicationStatus: null, output: 'Not Found' }
          : ok(JSON.stringify({ host: `${name}.internal` }));
      },
    });

    const document = await generator.generate('orders');

    expect(document['Server Information'].map((server) => server.host)).toEqual([
      'alpha.internal',
      'bravo.internal',
      'delta.internal',
      'echo.internal',
    ]);
    const { Errors } = errorLog.toStructuredJson();
    expect(Object.keys(Errors)).toEqual(['404']);
    expect(Errors['404']).toHaveLength(1);
    expect(Errors['404']?.[0]?.error).toBe('404_firewall_block');
    expect(Errors['404']?.[0]?.codebase).toBe('settings block for module charlie');
  });

  it('should build database tables and queries from records', async () => {
    const { generator } = setup({
      results: [result('String q = "SELECT id, email FROM users WHERE active = 1";', 'UserRepo.java')],
      respond: (kind) => (kind === 'database' ? ok('{"tables": ["users"], "columns": ["id"]}') : NOTHING),
    });

    const database = (await generator.generate('orders'))['Database Information'];

    expect(database['Table Information']).toEqual([
      { 'UserRepo.java': { users: { 'Field Information': [{ column_name: 'id', data_type: 'integer', CRUD: 'READ' }] } } },
    ]);
    expect(database.SQL_QUERIES).toEqual(['SELECT id, email FROM users WHERE active = 1']);
  });

  it('should collect API endpoints and dependencies from list answers', async () => {
    const { generator } = setup({
      results: [result('export const routes = build(router);', 'routes.ts')],
      respond: (kind) => {
        if (kind === 'api') {
          return ok('["GET /api/users", "/health"]');
        }
        return kind === 'dependencies' ? ok('```json\n["express", "pg", "express"]\n```') : NOTHING;
      },
    });

    const document = await generator.generate('orders');

    expect(document['API Endpoints']).toEqual(['GET /api/users', '/health']);
    expect(document.Dependencies).toEqual(['express', 'pg']);
  });

  it('should fall back to patterns when the LLM output is filtered', async () => {
    const { generator, errorLog } = setup({
      results: [result('@GetMapping("/orders")\nimport org.example.OrderService;', 'OrderController.java')],
      respond: (kind) =>
        kind === 'api' || kind === 'dependencies'
          ? { transportStatus: 200, applicationStatus: 403, output: 'blocked' }
          : NOTHING,
    });

    const document = await generator.generate('orders');

    expect(document['API Endpoints']).toEqual(['/orders']);
    expect(document.Dependencies).toEqual(['org.example.OrderService']);
    expect(errorLog.entries().map((entry) => entry.error_type)).toEqual(['llm_internal_403', 'llm_internal_403']);
  });

  it('should report no documents when retrieval finds nothing', async () => {
    const { generator, llm } = setup({ results: [], respond: () => NOTHING });

    const document = await generator.generate('orders');

    expect(document.summary.status).toBe('no_documents');
    expect(document.summary.chunks_processed).toBe(0);
    expect(llm.requests).toHaveLength(0);
  });

  it('should report stages in order', async () => {
    const stages: string[] = [];
    const { generator } = setup({ results: [], respond: () => NOTHING });

    await generator.generate('orders', { onStage: (stage) => stages.push(stage) });

    expect(stages).toEqual(['metadata', 'server', 'database', 'api', 'dependencies']);
  });

  describe('metadata', () => {
    const metadata: ApplicationMetadata = {
      Information: { Name: 'Orders', Type: '', 'Central ID': '', 'Company Platform': '', 'Tech Platform': '' },
      Architecture: { 'Target Production Environment': '', 'Hosting Environment': '', 'Internet Facing': 'No' },
      Risk: { 'Data Classification': 'None' },
      Regulatory: { 'Sensitive Data Elements (SDE) / Personally Identifiable Information (PII)': 'No' },
    };

    it('should include application metadata', async () => {
      const { generator } = setup({
        results: [],
        respond: () => NOTHING,
        metadata: { fetch: async () => metadata },
      });

      expect((await generator.generate('orders')).Application).toEqual(metadata);
    });

    it('should leave the section empty when the metadata step throws', async () => {
      const { generator } = setup({
        results: [],
        respond: () => NOTHING,
        metadata: {
          fetch: async () => {
            throw new Error('metadata exploded');
          },
        },
      });

      expect((await generator.generate('orders')).Application).toEqual({});
    });
  });

  describe('refinement', () => {
    const refinedConfig = (): CodespecConfig => {
      const config = testConfig();
      return { ...config, extraction: { ...config.extraction, enable_refinement: true } };
    };

    it('should attach the refined database view', async () => {
      const { generator } = setup({
        results: [],
        respond: () => NOTHING,
        config: refinedConfig(),
        refine: () => ok('{"Table Information": [], "SQL_QUERIES": ["SELECT 1 FROM dual"]}'),
      });

      const document = await generator.generate('orders');

      expect(document['Refined Database Information']).toEqual({
        'Table Information': [],
        SQL_QUERIES: ['SELECT 1 FROM dual'],
      });
      expect(document.summary.refinement).toBe('applied');
    });

    it('should keep the deterministic view when refinement fails', async () => {
      const { generator } = setup({
        results: [],
        respond: () => NOTHING,
        config: refinedConfig(),
        refine: () => ({ transportStatus: 500, applicationStatus: null, output: 'error' }),
      });

      const document = await generator.generate('orders');

      expect(document['Refined Database Information']).toBeUndefined();
      expect(document.summary.refinement).toBe('fallback');
    });
  });
});

describe('listItems', () => {
  it('should read strings and join string fields of objects', () => {
    expect(
      listItems({ items: ['/a', { method: 'GET', path: '/b' }, 3, ''], source_file: 'x.ts' })
    ).toEqual(['/a', 'GET /b']);
  });
});

describe('calculateCoverage', () => {
  it('should count configuration only when a server carries some', () => {
    const coverage = calculateCoverage(
      [{ host: 'a', hosts: [], ports: [], endpoints: [], configuration: { pool: 5 } }],
      { 'Table Information': [], SQL_QUERIES: ['SELECT 1 FROM t'], Invalid_SQL_Queries: [] },
      [],
      ['pg']
    );

    expect(coverage).toEqual({
      percentage: 80,
      areas_found: 4,
      total_areas: 5,
      areas: { database: true, server: true, api: false, dependencies: true, configuration: true },
    });
  });
});
