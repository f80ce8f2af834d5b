/**
 * Unit tests for commit and export sinks
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it, jest } from '@jest/globals';

import { CompositeSink, fileTimestamp, FileExportSink, HttpCommitSink } from '@services/commit-sink';

import { RecordingSink, sampleDocument } from '../../helpers/fakes';

const URL = 'http://commit.test/commit';

describe('HttpCommitSink', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should post the codebase and document', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => new Response('{"stored": true}', { status: 201 }));
    const document = sampleDocument('orders');

    const result = await new HttpCommitSink(URL, 1000).commit('orders', document);

    expect(result).toEqual({ ok: true, message: 'Committed orders' });
    const init = fetchSpy.mock.calls[0]?.[1];
    expect(init?.body).toBe(JSON.stringify({ codebase: 'orders', content: document }));
  });

  it('should report a non-2xx status', async () => {
    jest.spyOn(globalThis, 'fetch').mockImplementation(async () => new Response('oops', { status: 500 }));

    expect(await new HttpCommitSink(URL, 1000).commit('orders', sampleDocument('orders'))).toEqual({
      ok: false,
      message: 'HTTP 500: oops',
    });
  });

  it('should report a connection failure', async () => {
    jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    expect(await new HttpCommitSink(URL, 1000).commit('orders', sampleDocument('orders'))).toEqual({
      ok: false,
      message: `Cannot connect to commit service at ${URL}`,
    });
  });
});

describe('FileExportSink', () => {
  let directory: string | undefined;

  afterEach(async () => {
    if (directory !== undefined) {
      await rm(directory, { recursive: true, force: true });
      directory = undefined;
    }
  });

  it('should write the document under a timestamped, file-safe name', async () => {
    directory = await mkdtemp(join(tmpdir(), 'codespec-export-'));
    const target = join(directory, 'nested');
    const document = sampleDocument('orders/svc');
    const sink = new FileExportSink(target, () => new Date('2024-01-02T03:04:05.678Z'));

    const result = await sink.commit('orders/svc', document);

    const expectedPath = join(target, 'orders_svc_2024-01-02T03-04-05-678Z.json');
    expect(result).toEqual({ ok: true, message: expectedPath });
    const written = await readFile(expectedPath, 'utf-8');
    expect(written.endsWith('}\n')).toBe(true);
    expect(JSON.parse(written)).toEqual(document);
  });

  it('should format timestamps without colons or dots', () => {
    expect(fileTimestamp(new Date('2024-01-02T03:04:05.678Z'))).toBe('2024-01-02T03-04-05-678Z');
  });
});

describe('CompositeSink', () => {
  it('should run every sink and fail if any failed', async () => {
    const first = new RecordingSink();
    const second = new RecordingSink({ ok: false, message: 'nope' });

    const result = await new CompositeSink([first, second]).commit('orders', sampleDocument('orders'));

    expect(result).toEqual({ ok: false, message: 'stored; nope' });
    expect(first.commits).toHaveLength(1);
    expect(second.commits).toHaveLength(1);
  });
});
