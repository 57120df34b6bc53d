import type { AnalysisResult, Finding } from '../analyzer/types.js';
import type { Post } from '../loader/types.js';
import { DEFAULT_TIMEZONE, formatDisplayTime } from '../utils/time.js';

export const ALERT_HEADER = '### 🚨 Korean financial sector threat detected';
export const MAX_ALERT_DETAILS = 5;

const TIMEOUT_MS = 30_000;

export interface AlertOptions {
  now?: Date;
  timeZone?: string;
  repository?: string; // "owner/name", adds an issues link to the footer
}

export interface DispatchResult {
  sent: boolean;
  error?: string;
}

/**
 * Post a finding refers to, or undefined when its 1-based index falls outside
 * the posts that were actually analyzed.
 */
export function resolveFinding(finding: Finding, posts: Post[]): Post | undefined {
  const idx = finding.tweet_index;
  if (idx < 1 || idx > posts.length) return undefined;
  return posts[idx - 1];
}

function renderFinding(finding: Finding, post: Post): string {
  const company = finding.company || 'N/A';
  const issueType = finding.issue_type || 'N/A';
  const severity = finding.severity ?? 'N/A';
  const link = post.permalink || '#';

  return `**${company}** - ${issueType} (${severity})
> ${finding.summary}
> [View original](${link})

`;
}

/**
 * Render the alert message. `posts` must be the subset that was sent to the
 * model, since finding indices point into it.
 */
export function renderAlert(analysis: AnalysisResult, posts: Post[], options: AlertOptions = {}): string {
  const timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
  const detectedAt = formatDisplayTime(options.now ?? new Date(), timeZone);

  let message = `${ALERT_HEADER}

| Field | Value |
|------|------|
| Detected at | ${detectedAt} (${timeZone}) |
| Confidence | ${analysis.confidence ?? 'N/A'} |

#### 📋 Summary
${analysis.summary || 'N/A'}

`;

  if (analysis.details.length > 0) {
    message += '#### 🔍 Details\n\n';
    for (const finding of analysis.details.slice(0, MAX_ALERT_DETAILS)) {
      const post = resolveFinding(finding, posts);
      if (post) message += renderFinding(finding, post);
    }
  }

  if (options.repository) {
    message += `\n---\n[GitHub Issues](https://github.com/${options.repository}/issues)`;
  }

  return message;
}

export async function sendAlert(webhookUrl: string, message: string): Promise<DispatchResult> {
  try {
    const res = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: message }),
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    if (res.status === 200 || res.status === 201) {
      console.log('  Mattermost alert sent.');
      return { sent: true };
    }

    const body = await res.text();
    const error = `Mattermost webhook returned ${res.status}: ${body.slice(0, 200)}`;
    console.error(`  ${error}`);
    return { sent: false, error };
  } catch (err) {
    const error = `Mattermost webhook failed: ${err instanceof Error ? err.message : String(err)}`;
    console.error(`  ${error}`);
    return { sent: false, error };
  }
}
