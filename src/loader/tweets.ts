import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { collectionFileSchema, rawTweetSchema, type LoadResult, type Post, type RawTweet } from './types.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function toPost(tweet: RawTweet, target: string): Post {
  return {
    text: tweet.text,
    author: tweet.user.username,
    timestamp: tweet.date,
    permalink: tweet.link,
    origin_target: target,
  };
}

/**
 * Name of the newest collection file in a target directory, or null when the
 * directory is missing or holds no JSON files.
 *
 * "Newest" is the last name in lexicographic order: the collector embeds a
 * sortable timestamp in each filename (e.g. `20260216_060000.json`). Files
 * whose names don't follow that convention will be picked in the wrong order.
 */
export async function findLatestCollectionFile(targetDir: string): Promise<string | null> {
  let names: string[];
  try {
    const entries = await readdir(targetDir, { withFileTypes: true });
    names = entries
      .filter((e) => (e.isFile() || e.isSymbolicLink()) && e.name.endsWith('.json'))
      .map((e) => e.name);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }

  if (names.length === 0) return null;
  names.sort();
  return names[names.length - 1];
}

export function parseCollectionFile(json: string, target: string): Post[] {
  const file = collectionFileSchema.safeParse(JSON.parse(json));
  if (!file.success) {
    throw new Error('expected an object with a "tweets" list');
  }

  const posts: Post[] = [];
  for (const item of file.data.tweets) {
    const tweet = rawTweetSchema.safeParse(item);
    if (tweet.success) posts.push(toPost(tweet.data, target));
  }
  return posts;
}

export function parseTargets(raw: string): string[] {
  return raw
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
}

/**
 * Load posts from the latest collection file of each target, tagged with the
 * target that produced them. A target with no directory or no files
 * contributes nothing; a broken file is reported and skipped without
 * affecting the other targets.
 */
export async function loadLatestTweets(dataDir: string, targets: readonly string[]): Promise<LoadResult> {
  const posts: Post[] = [];
  const errors: string[] = [];

  for (const rawTarget of targets) {
    const target = rawTarget.trim();
    if (!target) continue;

    const targetDir = join(dataDir, target);
    let filePath: string | null = null;

    try {
      const latest = await findLatestCollectionFile(targetDir);
      if (!latest) continue;

      filePath = join(targetDir, latest);
      const loaded = parseCollectionFile(await readFile(filePath, 'utf-8'), target);
      posts.push(...loaded);
      console.log(`  ${target}: ${loaded.length} posts from ${latest}`);
    } catch (err) {
      const message = `Failed to load ${filePath ?? targetDir}: ${err instanceof Error ? err.message : String(err)}`;
      console.error(`  ERROR (${target}): ${message}`);
      errors.push(message);
    }
  }

  return { posts, errors };
}
