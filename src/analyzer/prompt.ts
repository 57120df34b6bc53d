import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Post } from '../loader/types.js';

// Cost control: posts past this cap are left out of the prompt but still
// counted in the run record.
export const MAX_ANALYZED_POSTS = 30;

export const POST_DELIMITER = '\n---\n';

const entityGroupsSchema = z.array(
  z.object({
    label: z.string(),
    names: z.array(z.string()),
  }),
);

export type EntityGroup = z.infer<typeof entityGroupsSchema>[number];

export const FINANCIAL_ENTITIES: EntityGroup[] = entityGroupsSchema.parse(
  JSON.parse(readFileSync(new URL('../../resources/financial-entities.json', import.meta.url), 'utf-8')),
);

export function formatEntityList(groups: EntityGroup[] = FINANCIAL_ENTITIES): string {
  return groups.map((g) => `- ${g.label}: ${g.names.join(', ')}`).join('\n');
}

export function selectForAnalysis(posts: Post[]): Post[] {
  return posts.slice(0, MAX_ANALYZED_POSTS);
}

export function formatPost(post: Post, index: number): string {
  return `[${index + 1}] @${post.author} (${post.timestamp}) [target: ${post.origin_target}]\n${post.text}\nLink: ${post.permalink}`;
}

export function buildPrompt(posts: Post[]): string {
  const blocks = selectForAnalysis(posts).map(formatPost).join(POST_DELIMITER);

  return `You are a cyber threat intelligence and financial service monitoring analyst.

Analyze the posts below and decide whether any of them describe one of the following affecting a **Korean financial company or institution**:
1. Cyber attack (DDoS, ransomware, data breach, etc.)
2. Service outage (app errors, login failures, payment failures, transfers not going through, etc.)
3. Security incident (hacking, leaked customer data, etc.)

## Decision rules
- The Korean financial company or service must be **named directly** or be **clearly inferable** from the post.
- Exclude posts that only say "payment failed" without identifying which service.
- Exclude game payments, foreign services, and errors of the shopping mall itself.
- **Several people reporting the same problem with the same company at once** makes a real incident much more likely; raise confidence accordingly.

## Korean financial entities for reference
${formatEntityList()}

## Posts to analyze
${blocks}

## Response format (JSON)
{
  "relevant": true/false,
  "confidence": "high/medium/low",
  "issue_type": "cyber_attack/service_outage/security_incident/none",
  "summary": "2-3 sentence summary in Korean (empty string when not relevant)",
  "details": [
    {
      "tweet_index": 1,
      "company": "Affected company or institution (e.g. 카카오뱅크, 토스, 신한카드)",
      "issue_type": "Issue type (DDoS, app outage, payment error, data breach, etc.)",
      "severity": "high/medium/low",
      "summary": "Summary of that post"
    }
  ]
}

If nothing is directly related to a Korean financial company, or the link is unclear, respond with "relevant": false.
Output valid JSON only.`;
}
