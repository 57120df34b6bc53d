import { z } from 'zod';
import type { Post } from '../loader/types.js';
import { buildPrompt } from './prompt.js';
import { analysisResultSchema, emptyAnalysis, type AnalysisResult } from './types.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_MODEL = 'gpt-4o-mini';

const SYSTEM_PROMPT = 'You are a cybersecurity threat analyst. Respond only in valid JSON.';
const TEMPERATURE = 0.3;
const MAX_TOKENS = 2000;
const TIMEOUT_MS = 60_000;

export interface AnalysisOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/**
 * Remove a markdown code fence the model may have wrapped around its JSON,
 * e.g. "```json\n{...}\n```". Unwrapped text passes through unchanged.
 */
export function stripCodeFence(output: string): string {
  let content = output.trim();

  if (content.startsWith('```')) {
    const newline = content.indexOf('\n');
    content = newline === -1 ? '' : content.slice(newline + 1);
  }
  if (content.endsWith('```')) {
    content = content.slice(0, content.lastIndexOf('```'));
  }

  return content.trim();
}

export function parseAnalysisResponse(output: string): AnalysisResult {
  const parsed: unknown = JSON.parse(stripCodeFence(output));
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Analysis response is not a JSON object');
  }
  return analysisResultSchema.parse(parsed);
}

async function requestCompletion(prompt: string, options: AnalysisOptions): Promise<string | null> {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');

  const res = await fetch(`${baseUrl}/chat/completions`, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      model: options.model ?? DEFAULT_MODEL,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt },
      ],
      temperature: TEMPERATURE,
      max_tokens: MAX_TOKENS,
    }),
    signal: AbortSignal.timeout(options.timeoutMs ?? TIMEOUT_MS),
  });

  if (res.status !== 200) {
    const body = await res.text();
    console.error(`  OpenAI API error: ${res.status} - ${body.slice(0, 500)}`);
    return null;
  }

  const completion = chatCompletionSchema.safeParse(await res.json());
  if (!completion.success) {
    console.error('  OpenAI API returned no completion choices');
    return null;
  }

  return completion.data.choices[0].message.content ?? '';
}

/**
 * Ask the model whether any of the posts describe an incident at a Korean
 * financial institution. Only the first MAX_ANALYZED_POSTS posts are sent.
 *
 * Never throws: HTTP errors, timeouts and unparseable output are logged and
 * come back as the non-relevant default result.
 */
export async function analyzeTweets(posts: Post[], options: AnalysisOptions): Promise<AnalysisResult> {
  if (posts.length === 0) return emptyAnalysis();

  const prompt = buildPrompt(posts);
  let output: string | null = null;

  try {
    output = await requestCompletion(prompt, options);
    if (output === null) return emptyAnalysis();

    return parseAnalysisResponse(output);
  } catch (err) {
    const raw = output === null ? '' : `\n  Raw output: ${output.slice(0, 500)}`;
    console.error(`  Analysis failed: ${err instanceof Error ? err.message : String(err)}${raw}`);
    return emptyAnalysis();
  }
}
