import { z } from 'zod';

export interface Post {
  text: string;
  author: string; // "unknown" when the collector had no username
  timestamp: string; // display-only, passed through as collected
  permalink: string;
  origin_target: string;
}

export interface LoadResult {
  posts: Post[];
  errors: string[];
}

// Collector output: { tweets: [{ text, user: { username }, date, link }] }
export const rawTweetSchema = z.object({
  text: z.string().catch(''),
  user: z
    .object({ username: z.string().catch('unknown') })
    .catch({ username: 'unknown' }),
  date: z.string().catch(''),
  link: z.string().catch(''),
});

export const collectionFileSchema = z.object({
  tweets: z.array(z.unknown()).default([]),
});

export type RawTweet = z.infer<typeof rawTweetSchema>;
