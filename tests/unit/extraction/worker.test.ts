/**
 * Unit tests for per-chunk extraction
 */

import { describe, expect, it } from '@jest/globals';

import { ErrorLog } from '@utils/error-log';
import { RequestTimeoutError, ServiceConnectionError } from '@utils/errors';
import { type ExtractionPrompts } from '@/types/extraction';
import { type LlmRequest } from '@llm/client';
import { ExtractionWorker, type WorkerOptions } from '@extraction/worker';

import { chunk, FakeLlmClient, ok, type LlmResponder } from '../../helpers/fakes';

const prompts: ExtractionPrompts = {
  system: 'system prompt',
  detection: 'detect prompt',
  validation: 'validate prompt',
  query: 'server host',
};

const options: WorkerOptions = {
  minContentLength: 4,
  redactionRules: [],
  enableValidation: false,
  detectionTimeoutMs: 1000,
  validationTimeoutMs: 1000,
};

const setup = (responder: LlmResponder, overrides: Partial<WorkerOptions> = {}) => {
  const llm = new FakeLlmClient(responder);
  const errorLog = new ErrorLog();
  const worker = new ExtractionWorker(llm, errorLog, { ...options, ...overrides });
  return { llm, errorLog, worker };
};

const config = chunk('db.host=orders-db\ndb.port=5432', 'src/main/resources/application.properties');

describe('ExtractionWorker', () => {
  it('should extract a record from clean JSON output', async () => {
    const { worker, llm, errorLog } = setup(() => ok('{"host": "orders-db", "port": 5432}'));

    const result = await worker.extract(config, 3, prompts);

    expect(result).toEqual({
      index: 3,
      chunk: config,
      record: { host: 'orders-db', port: 5432 },
      outcome: 'extracted',
      validation: 'skipped',
    });
    expect(llm.requests).toEqual([
      { system_prompt: 'system prompt', user_prompt: 'detect prompt', codebase: config.content },
    ]);
    expect(errorLog.size).toBe(0);
  });

  it('should skip content below the minimum length without calling the LLM', async () => {
    const { worker, llm } = setup(() => ok('{}'));

    const result = await worker.extract(chunk('  ab  ', 'a.txt'), 0, prompts);

    expect(result.outcome).toBe('skipped');
    expect(result.record).toBeNull();
    expect(llm.requests).toHaveLength(0);
  });

  it('should apply redaction rules before sending content', async () => {
    const { worker, llm } = setup(() => ok('no'), {
      redactionRules: [
        { search: '@corp', replace: '@corps' },
        { search: '@', replace: '' },
      ],
    });

    await worker.extract(chunk('contact admin@corp.example', 'a.txt'), 0, prompts);

    expect(llm.requests[0]?.codebase).toBe('contact admincorps.example');
  });

  it('should report no information for a negative answer', async () => {
    const { worker, errorLog } = setup(() => ok('No.'));

    const result = await worker.extract(config, 0, prompts);

    expect(result.outcome).toBe('no_information');
    expect(result.record).toBeNull();
    expect(result.diagnostic).toBe('no information found');
    expect(errorLog.size).toBe(0);
  });

  it('should keep unparsable output as a fallback record', async () => {
    const { worker } = setup(() => ok('The host seems to be orders-db'));

    const result = await worker.extract(config, 0, prompts);

    expect(result.outcome).toBe('fallback');
    expect(result.record).toEqual({
      source_file: 'src/main/resources/application.properties',
      raw_llm_output: 'The host seems to be orders-db',
      parsing_error: true,
      extraction_status: 'partial',
    });
  });

  it('should log a 404 transport status as a firewall block', async () => {
    const { worker, errorLog } = setup(() => ({
      transportStatus: 404,
      applicationStatus: null,
      output: 'Blocked',
    }));

    const result = await worker.extract(config, 0, prompts);

    expect(result.outcome).toBe('transport_error');
    expect(result.diagnostic).toBe('HTTP 404');
    const [entry] = errorLog.entries();
    expect(entry?.error_type).toBe('404_firewall_block');
    expect(entry?.status_code).toBe(404);
    expect(entry?.severity).toBe('MEDIUM');
    expect(entry?.response_text).toBe('Blocked');
    expect(entry?.file_source).toBe('src/main/resources/application.properties');
    expect(entry?.url).toBe('http://llm.test/LLM-API');
    expect(entry?.codebase_snippet).toBe(config.content);
  });

  it('should log other transport statuses with their code', async () => {
    const { worker, errorLog } = setup(() => ({ transportStatus: 502, applicationStatus: null, output: '' }));

    await worker.extract(config, 0, prompts);

    expect(errorLog.entries()[0]?.error_type).toBe('http_502');
    expect(errorLog.entries()[0]?.severity).toBe('HIGH');
  });

  it('should treat a non-200 application status as filtered', async () => {
    const { worker, errorLog } = setup(() => ({ transportStatus: 200, applicationStatus: 403, output: 'policy' }));

    const result = await worker.extract(config, 0, prompts);

    expect(result.outcome).toBe('filtered');
    expect(result.record).toBeNull();
    expect(errorLog.entries()[0]?.error_type).toBe('llm_internal_403');
  });

  it('should log an unreadable body', async () => {
    const { worker, errorLog } = setup(() => ({ transportStatus: 200, applicationStatus: null, output: '<html>' }));

    const result = await worker.extract(config, 0, prompts);

    expect(result.outcome).toBe('transport_error');
    expect(errorLog.entries()[0]?.error_type).toBe('invalid_json_response');
  });

  it.each<[Error, string]>([
    [new RequestTimeoutError('LLM API request', 1000), 'timeout'],
    [new ServiceConnectionError('LLM API', 'http://llm.test/LLM-API'), 'connection_error'],
    [new Error('boom'), 'unexpected_error'],
  ])('should convert a thrown %p into a transport error', async (error, type) => {
    const { worker, errorLog } = setup(() => {
      throw error;
    });

    const result = await worker.extract(config, 0, prompts);

    expect(result.outcome).toBe('transport_error');
    expect(errorLog.entries()[0]?.error_type).toBe(type);
    expect(errorLog.entries()[0]?.status_code).toBeUndefined();
  });

  describe('validation', () => {
    const answer =
      (validation: LlmResponder): LlmResponder =>
      (request: LlmRequest) =>
        request.user_prompt === 'validate prompt' ? validation(request) : ok('{"host": "orders-db"}');

    it('should confirm a record on a yes', async () => {
      const { worker, llm } = setup(
        answer(() => ok('Yes')),
        { enableValidation: true }
      );

      const result = await worker.extract(config, 0, prompts);

      expect(result.validation).toBe('confirmed');
      expect(llm.requests[1]?.codebase).toBe('{"host":"orders-db"}');
    });

    it('should keep a disputed record', async () => {
      const { worker } = setup(
        answer(() => ok('No')),
        { enableValidation: true }
      );

      const result = await worker.extract(config, 0, prompts);

      expect(result.outcome).toBe('extracted');
      expect(result.validation).toBe('disputed');
      expect(result.record).toEqual({ host: 'orders-db' });
    });

    it('should log a failed validation call and keep the record', async () => {
      const { worker, errorLog } = setup(
        answer(() => ({ transportStatus: 500, applicationStatus: null, output: 'down' })),
        { enableValidation: true }
      );

      const result = await worker.extract(config, 0, prompts);

      expect(result.outcome).toBe('extracted');
      expect(result.validation).toBe('unavailable');
      expect(errorLog.entries()[0]?.error_type).toBe('validation_api_500');
    });

    it('should skip validation for kinds without a validation prompt', async () => {
      const { worker, llm } = setup(() => ok('["/users"]'), { enableValidation: true });
      const apiPrompts: ExtractionPrompts = { system: prompts.system, detection: prompts.detection, query: prompts.query };

      const result = await worker.extract(config, 0, apiPrompts);

      expect(result.validation).toBe('skipped');
      expect(llm.requests).toHaveLength(1);
    });
  });
});
