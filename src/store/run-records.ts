import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { analysisResultSchema, type AnalysisResult } from '../analyzer/types.js';
import { DEFAULT_TIMEZONE, formatFileStamp } from '../utils/time.js';

// Leading underscore keeps records apart from the per-target collection dirs.
export const RUN_RECORD_PREFIX = '_analysis_';

export const runRecordSchema = z.object({
  timestamp: z.string(),
  tweet_count: z.number().int().nonnegative(),
  analysis: analysisResultSchema,
});

export type RunRecord = z.infer<typeof runRecordSchema>;

export function createRunRecord(tweetCount: number, analysis: AnalysisResult, now: Date = new Date()): RunRecord {
  return {
    timestamp: now.toISOString(),
    tweet_count: tweetCount,
    analysis,
  };
}

// Suffixes for runs that land in the same second; zero-padded so they keep
// sorting after the unsuffixed name and in write order.
const MAX_SAME_SECOND_RECORDS = 1000;

export function runRecordFileName(date: Date, timeZone = DEFAULT_TIMEZONE, attempt = 0): string {
  const suffix = attempt > 0 ? `_${String(attempt).padStart(3, '0')}` : '';
  return `${RUN_RECORD_PREFIX}${formatFileStamp(date, timeZone)}${suffix}.json`;
}

function isExisting(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Write one record per run. Records are never rewritten: a name already taken
 * by an earlier run in the same second gets a numeric suffix. Retention is
 * left to whoever operates the data directory.
 */
export async function saveRunRecord(dataDir: string, record: RunRecord, timeZone = DEFAULT_TIMEZONE): Promise<string> {
  await mkdir(dataDir, { recursive: true });
  const date = new Date(record.timestamp);
  const body = JSON.stringify(record, null, 2);

  for (let attempt = 0; attempt < MAX_SAME_SECOND_RECORDS; attempt++) {
    const filePath = join(dataDir, runRecordFileName(date, timeZone, attempt));
    try {
      await writeFile(filePath, body, { encoding: 'utf-8', flag: 'wx' });
      return filePath;
    } catch (err) {
      if (!isExisting(err)) throw err;
    }
  }

  throw new Error(`Too many run records for ${runRecordFileName(date, timeZone)}`);
}

export async function readRunRecord(filePath: string): Promise<RunRecord> {
  return runRecordSchema.parse(JSON.parse(await readFile(filePath, 'utf-8')));
}

/** Record filenames in chronological order. */
export async function listRunRecords(dataDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dataDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  return names.filter((n) => n.startsWith(RUN_RECORD_PREFIX) && n.endsWith('.json')).sort();
}

/**
 * Most recent record, or null when there is none. `record` is null when the
 * latest file exists but can't be read as a record.
 */
export async function latestRunRecord(dataDir: string): Promise<{ path: string; record: RunRecord | null } | null> {
  const names = await listRunRecords(dataDir);
  if (names.length === 0) return null;

  const path = join(dataDir, names[names.length - 1]);
  try {
    return { path, record: await readRunRecord(path) };
  } catch {
    return { path, record: null };
  }
}
