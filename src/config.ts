import { parseTargets } from './loader/tweets.js';
import { DEFAULT_BASE_URL, DEFAULT_MODEL } from './analyzer/analyze.js';
import { DEFAULT_TIMEZONE, isValidTimeZone } from './utils/time.js';

export interface AppConfig {
  readonly openai: {
    readonly apiKey?: string;
    readonly baseUrl: string;
    readonly model: string;
  };
  readonly webhookUrl?: string;
  readonly dataDir: string;
  readonly targets: readonly string[];
  readonly timeZone: string;
  readonly repository?: string;
}

/**
 * Read configuration once at startup. A missing API key or webhook is not an
 * error here: the pipeline treats both as reasons to skip work.
 *
 * @throws Error if ALERT_TIMEZONE is not a recognised IANA zone
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timeZone = env.ALERT_TIMEZONE || DEFAULT_TIMEZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new Error(`Invalid ALERT_TIMEZONE: ${timeZone}`);
  }

  return Object.freeze({
    openai: Object.freeze({
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: env.OPENAI_BASE_URL || DEFAULT_BASE_URL,
      model: env.OPENAI_MODEL || DEFAULT_MODEL,
    }),
    webhookUrl: env.MATTERMOST_WEBHOOK || undefined,
    dataDir: env.DATA_DIR || 'data',
    targets: Object.freeze(parseTargets(env.TARGETS ?? '')),
    timeZone,
    repository: env.GITHUB_REPOSITORY || undefined,
  });
}
