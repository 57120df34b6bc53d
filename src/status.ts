import { latestRunRecord } from './store/run-records.js';

/** Lines describing the most recent run record in `dataDir`. */
export async function describeLatestRun(dataDir: string): Promise<string[]> {
  const latest = await latestRunRecord(dataDir);
  if (!latest) return ['Last run: never'];

  const { path, record } = latest;
  if (!record) return [`Last run: unreadable record ${path}`];

  const { analysis } = record;
  const lines = [
    `Last run: ${record.timestamp}`,
    `Record: ${path}`,
    `Posts loaded: ${record.tweet_count}`,
    `Relevant: ${analysis.relevant}${analysis.confidence ? ` (${analysis.confidence})` : ''}`,
  ];
  if (analysis.summary) lines.push(`Summary: ${analysis.summary}`);
  return lines;
}
