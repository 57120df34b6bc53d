import { sendAlert, renderAlert } from './alert/mattermost.js';
import { analyzeTweets } from './analyzer/analyze.js';
import { selectForAnalysis } from './analyzer/prompt.js';
import type { AnalysisResult } from './analyzer/types.js';
import type { AppConfig } from './config.js';
import { loadLatestTweets } from './loader/tweets.js';
import { createRunRecord, saveRunRecord } from './store/run-records.js';

export type PipelineOutcome =
  | { status: 'no-credential' }
  | { status: 'no-posts'; tweetCount: 0 }
  | {
      status: 'completed';
      tweetCount: number;
      analysis: AnalysisResult;
      dispatched: boolean;
      recordPath: string;
    };

/**
 * One analysis run: load → analyze → alert if relevant → persist.
 *
 * Returns early, without calling the model or writing a record, when there is
 * no API key or nothing to analyze. Alert delivery failures are logged and do
 * not stop the record from being written.
 */
export async function runPipeline(config: AppConfig, now?: Date): Promise<PipelineOutcome> {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    console.log('OPENAI_API_KEY not set, skipping analysis.');
    return { status: 'no-credential' };
  }

  console.log(`Loading latest posts for ${config.targets.length} targets from ${config.dataDir}...`);
  const { posts } = await loadLatestTweets(config.dataDir, config.targets);
  console.log(`Loaded ${posts.length} posts.`);

  if (posts.length === 0) {
    console.log('No posts to analyze.');
    return { status: 'no-posts', tweetCount: 0 };
  }

  const analyzed = selectForAnalysis(posts);
  console.log(`Analyzing ${analyzed.length} posts with ${config.openai.model}...`);
  const analysis = await analyzeTweets(analyzed, {
    apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.model,
  });
  console.log(`Result: relevant=${analysis.relevant}, confidence=${analysis.confidence ?? 'n/a'}`);

  const runAt = now ?? new Date();
  let dispatched = false;

  if (analysis.relevant) {
    console.log('Korean financial sector threat detected.');
    console.log(`  Summary: ${analysis.summary}`);

    if (config.webhookUrl) {
      const message = renderAlert(analysis, analyzed, {
        now: runAt,
        timeZone: config.timeZone,
        repository: config.repository,
      });
      const result = await sendAlert(config.webhookUrl, message);
      dispatched = result.sent;
    } else {
      console.warn('MATTERMOST_WEBHOOK not set, skipping alert.');
    }
  } else {
    console.log('No Korean financial sector threat found, no alert sent.');
  }

  const record = createRunRecord(posts.length, analysis, runAt);
  const recordPath = await saveRunRecord(config.dataDir, record, config.timeZone);
  console.log(`Saved run record: ${recordPath}`);

  return { status: 'completed', tweetCount: posts.length, analysis, dispatched, recordPath };
}
