/**
 * Tests for JSON sample collection
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, type LogSink } from '../logger';
import { Job, Pipeline } from '../__tests__/fixtures/pipeline.schema';
import { collectSamples, isInterestingSample, jsonColumns, pickSample, writeSampleFile, type SampleSource } from './collector';
import { loadOverrideFile } from '../generator/overrides';

function sourceOf(rows: Record<string, readonly unknown[]>): SampleSource {
  return {
    values: vi.fn(async (table: string, column: string) => rows[`${table}.${column}`] ?? []),
  };
}

describe('isInterestingSample', () => {
  it.each([null, undefined, {}, []])('rejects %j', (value) => {
    expect(isInterestingSample(value)).toBe(false);
  });

  it.each([{ retries: 3 }, [1], 'text', 0, false])('accepts %j', (value) => {
    expect(isInterestingSample(value)).toBe(true);
  });
});

describe('pickSample', () => {
  it('prefers the first value with structure', () => {
    expect(pickSample([null, {}, { retries: 3 }, { retries: 4 }])).toEqual({ retries: 3 });
  });

  it('falls back to the first non-null value', () => {
    expect(pickSample([null, [], {}])).toEqual([]);
  });

  it('returns undefined when every value is null', () => {
    expect(pickSample([null, null])).toBeUndefined();
    expect(pickSample([])).toBeUndefined();
  });
});

describe('jsonColumns', () => {
  it('lists only json columns', () => {
    expect(jsonColumns(Pipeline).map((col) => col.name)).toEqual(['config']);
    expect(jsonColumns(Job)).toEqual([]);
  });
});

describe('collectSamples', () => {
  it('collects one sample per json column', async () => {
    const source = sourceOf({ 'pipeline.config': [null, { steps: ['build'] }] });

    const samples = await collectSamples(source, [Pipeline, Job]);

    expect(samples).toEqual({ pipeline: { config: { steps: ['build'] } } });
    expect(source.values).toHaveBeenCalledTimes(1);
    expect(source.values).toHaveBeenCalledWith('pipeline', 'config');
  });

  it('leaves out columns without a usable value', async () => {
    const log = vi.fn<LogSink>();

    const samples = await collectSamples(sourceOf({}), [Pipeline], createLogger({ level: 'debug', log }));

    expect(samples).toEqual({});
    expect(log.mock.calls).toEqual([
      ['debug', '[graphseed] No sample for pipeline.config', undefined],
      ['info', '[graphseed] Collected samples for 0 table(s)', undefined],
    ]);
  });

  it('accepts schema values directly', async () => {
    const schema = new Map([['pipeline', Pipeline]]);

    const samples = await collectSamples(sourceOf({ 'pipeline.config': [[1, 2]] }), schema.values());

    expect(samples).toEqual({ pipeline: { config: [1, 2] } });
  });
});

describe('writeSampleFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'graphseed-samples-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes pretty JSON that loads back as overrides', async () => {
    const filePath = join(dir, 'nested', 'json_samples.json');
    const samples = { pipeline: { config: { steps: ['build'] } } };

    await writeSampleFile(filePath, samples);

    expect(await readFile(filePath, 'utf-8')).toBe(JSON.stringify(samples, null, 2));
    await expect(loadOverrideFile(filePath)).resolves.toEqual(samples);
  });
});
