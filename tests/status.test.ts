import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describeLatestRun } from '../src/status.js';
import { createRunRecord, saveRunRecord } from '../src/store/run-records.js';

let dataDir: string;

beforeEach(async () => {
  dataDir = await mkdtemp(join(tmpdir(), 'kfin-watch-test-'));
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

describe('Status report', () => {
  it('says never when there are no records', async () => {
    expect(await describeLatestRun(dataDir)).toEqual(['Last run: never']);
  });

  it('describes the latest record', async () => {
    const analysis = { relevant: true, confidence: 'high' as const, summary: '토스 송금 장애', details: [] };
    const path = await saveRunRecord(dataDir, createRunRecord(12, analysis, new Date('2026-02-16T06:00:00Z')), 'UTC');

    expect(await describeLatestRun(dataDir)).toEqual([
      'Last run: 2026-02-16T06:00:00.000Z',
      `Record: ${path}`,
      'Posts loaded: 12',
      'Relevant: true (high)',
      'Summary: 토스 송금 장애',
    ]);
  });

  it('flags a corrupt latest record instead of throwing', async () => {
    const path = join(dataDir, '_analysis_20260216_060000.json');
    await writeFile(path, '{"timestamp": 42}', 'utf-8');

    expect(await describeLatestRun(dataDir)).toEqual([`Last run: unreadable record ${path}`]);
  });
});
