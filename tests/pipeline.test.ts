import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AppConfig } from '../src/config.js';
import { runPipeline } from '../src/pipeline.js';
import { listRunRecords, readRunRecord } from '../src/store/run-records.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const LLM_URL = 'https://llm.test/v1/chat/completions';
const WEBHOOK_URL = 'https://chat.test/hooks/abc';
const testDate = new Date('2026-02-16T06:00:00Z');

let dataDir: string;

beforeEach(async () => {
  mockFetch.mockReset();
  dataDir = await mkdtemp(join(tmpdir(), 'kfin-watch-test-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dataDir, { recursive: true, force: true });
});

const makeConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  openai: { apiKey: 'test-key', baseUrl: 'https://llm.test/v1', model: 'gpt-4o-mini' },
  webhookUrl: WEBHOOK_URL,
  dataDir,
  targets: ['카카오뱅크'],
  timeZone: 'Asia/Seoul',
  ...overrides,
});

async function writePosts(target: string, count: number): Promise<void> {
  const tweets = Array.from({ length: count }, (_, i) => ({
    text: `카카오뱅크 앱 안 열림 ${i + 1}`,
    user: { username: `user${i + 1}` },
    date: '2026-02-16 09:00',
    link: `https://x.com/user${i + 1}/status/${i + 1}`,
  }));
  await mkdir(join(dataDir, target), { recursive: true });
  await writeFile(join(dataDir, target, '20260216_060000.json'), JSON.stringify({ tweets }), 'utf-8');
}

function respondWith(analysis: object, webhookStatus = 200): void {
  mockFetch.mockImplementation(async (url: string) => {
    if (url === LLM_URL) {
      return new Response(JSON.stringify({ choices: [{ message: { content: JSON.stringify(analysis) } }] }), {
        status: 200,
      });
    }
    return new Response('ok', { status: webhookStatus });
  });
}

const RELEVANT = {
  relevant: true,
  confidence: 'high',
  issue_type: 'service_outage',
  summary: '카카오뱅크 앱 장애 다수 보고',
  details: [{ tweet_index: 1, company: '카카오뱅크', issue_type: 'app outage', severity: 'high', summary: '앱 접속 불가' }],
};

describe('Pipeline early exits', () => {
  it('skips everything without an API key', async () => {
    await writePosts('카카오뱅크', 5);

    const outcome = await runPipeline(makeConfig({ openai: { baseUrl: 'https://llm.test/v1', model: 'gpt-4o-mini' } }));

    expect(outcome).toEqual({ status: 'no-credential' });
    expect(mockFetch).not.toHaveBeenCalled();
    expect(await listRunRecords(dataDir)).toEqual([]);
  });

  it('stops without analysis or a record when no posts load', async () => {
    const outcome = await runPipeline(makeConfig({ targets: ['missing'] }), testDate);

    expect(outcome).toEqual({ status: 'no-posts', tweetCount: 0 });
    expect(mockFetch).not.toHaveBeenCalled();
    expect(await listRunRecords(dataDir)).toEqual([]);
  });
});

describe('Pipeline runs', () => {
  it('persists a record and sends no alert when nothing is relevant', async () => {
    await writePosts('카카오뱅크', 5);
    respondWith({ relevant: false, confidence: 'low', issue_type: 'none', summary: '', details: [] });

    const outcome = await runPipeline(makeConfig(), testDate);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe(LLM_URL);
    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.dispatched).toBe(false);
    expect(outcome.recordPath).toBe(join(dataDir, '_analysis_20260216_150000.json'));

    const record = await readRunRecord(outcome.recordPath);
    expect(record.tweet_count).toBe(5);
    expect(record.analysis.relevant).toBe(false);
  });

  it('analyzes the first 30 of 40 posts and alerts on a relevant finding', async () => {
    await writePosts('카카오뱅크', 40);
    respondWith(RELEVANT);

    const outcome = await runPipeline(makeConfig(), testDate);

    expect(mockFetch).toHaveBeenCalledTimes(2);

    const [llmUrl, llmInit] = mockFetch.mock.calls[0];
    expect(llmUrl).toBe(LLM_URL);
    const prompt: string = JSON.parse(llmInit.body).messages[1].content;
    expect(prompt).toContain('[30] @user30 (');
    expect(prompt).not.toContain('[31] @');

    const [hookUrl, hookInit] = mockFetch.mock.calls[1];
    expect(hookUrl).toBe(WEBHOOK_URL);
    const text: string = JSON.parse(hookInit.body).text;
    expect(text).toContain('**카카오뱅크** - app outage (high)');
    expect(text).toContain('[View original](https://x.com/user1/status/1)');

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.dispatched).toBe(true);
    expect(outcome.tweetCount).toBe(40);

    const record = await readRunRecord(outcome.recordPath);
    expect(record.tweet_count).toBe(40);
    expect(record.analysis.details[0].company).toBe('카카오뱅크');
  });

  it('skips the alert when no webhook is configured', async () => {
    await writePosts('카카오뱅크', 3);
    respondWith(RELEVANT);

    const outcome = await runPipeline(makeConfig({ webhookUrl: undefined }), testDate);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('MATTERMOST_WEBHOOK not set, skipping alert.');
    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.dispatched).toBe(false);
    expect((await readRunRecord(outcome.recordPath)).analysis.relevant).toBe(true);
  });

  it('still persists the record when the webhook fails', async () => {
    await writePosts('카카오뱅크', 3);
    respondWith(RELEVANT, 500);

    const outcome = await runPipeline(makeConfig(), testDate);

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.dispatched).toBe(false);
    expect(await listRunRecords(dataDir)).toEqual(['_analysis_20260216_150000.json']);
  });

  it('persists the default result when the model call fails', async () => {
    await writePosts('카카오뱅크', 2);
    mockFetch.mockResolvedValue(new Response('upstream error', { status: 502 }));

    const outcome = await runPipeline(makeConfig(), testDate);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    const record = await readRunRecord(outcome.recordPath);
    expect(record.analysis).toEqual({ relevant: false, summary: '', details: [] });
  });

  it('includes posts from every target in the record count', async () => {
    await writePosts('카카오뱅크', 2);
    await writePosts('토스', 3);
    respondWith({ relevant: false, summary: '', details: [] });

    const outcome = await runPipeline(makeConfig({ targets: ['카카오뱅크', '토스'] }), testDate);

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.tweetCount).toBe(5);
  });
});
