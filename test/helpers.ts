/**
 * Shared test helpers: fixtures, fetch stubs, workspaces and sample data
 */
import { mkdtemp, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import { loadConfig, type Config } from '../src/lib/config.js';
import type { FetchLike } from '../src/lib/http.js';
import type { Story } from '../src/types/story.js';

export const TEST_ENV: NodeJS.ProcessEnv = {
  JINA_KEY: 'test-jina-key',
  OPENAI_BASE: 'http://llm.test/v1',
  OPENAI_API_KEY: 'test-openai-key',
  AZURE_SPEECH_KEY: 'test-speech-key',
  AZURE_SPEECH_REGION: 'westus',
  LOG_LEVEL: 'error',
};

export async function loadFixture(name: string): Promise<string> {
  return readFile(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

/**
 * Temporary project root (has a package.json, no config.yaml)
 */
export async function makeWorkspace(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'hn-narrator-'));
  await writeFile(join(dir, 'package.json'), '{}', 'utf-8');
  return dir;
}

export function makeConfig(cwd: string, env: NodeJS.ProcessEnv = TEST_ENV): Config {
  return loadConfig({ cwd, env });
}

export type FetchHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

export function stubFetch(handler: FetchHandler) {
  return vi.fn<FetchLike>(async (input, init) => handler(String(input), init));
}

export function headerOf(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}

export function makeStory(overrides: Partial<Story> = {}): Story {
  const id = overrides.id ?? '1001';
  return {
    id,
    title: 'Writing a compiler in a weekend',
    url: 'https://example.com/compilers',
    rank: 1,
    hackerNewsUrl: `https://news.ycombinator.com/item?id=${id}`,
    points: 312,
    commentCount: 128,
    ...overrides,
  };
}
