import { mkdtemp, readdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { cliOverrides, formatReport, main, parseCliArgs } from './cli.js';
import type { CompletionClient } from './lib/completion-client.js';
import { ConfigError, ExtractionError } from './lib/errors.js';
import type { RunReport } from './types/story.js';
import { loadFixture, makeStory, makeWorkspace, stubFetch, TEST_ENV } from '../test/helpers.js';

describe('parseCliArgs', () => {
  it('reads every flag', () => {
    expect(
      parseCliArgs(['--top-n', '5', '-o', 'out', '--max-tokens', '500', '--concurrency', '2', '--cron', '0 * * * *'])
    ).toEqual({
      topN: 5,
      output: 'out',
      maxTokens: 500,
      concurrency: 2,
      cron: '0 * * * *',
      help: false,
    });
  });

  it('defaults to no overrides', () => {
    expect(parseCliArgs([])).toEqual({ help: false });
  });

  it('rejects non-positive numbers', () => {
    expect(() => parseCliArgs(['--top-n', '0'])).toThrow('Invalid value for --top-n');
    expect(() => parseCliArgs(['--concurrency', 'two'])).toThrow(ConfigError);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Invalid arguments');
  });
});

describe('cliOverrides', () => {
  it('turns flags into a config layer', () => {
    expect(cliOverrides({ topN: 5, output: 'out', maxTokens: 500, help: false })).toEqual({
      pipeline: { topN: 5 },
      paths: { output: 'out' },
      extraction: { maxChars: 2000 },
    });
  });

  it('leaves unset flags out', () => {
    expect(cliOverrides({ help: false })).toEqual({ pipeline: {} });
  });
});

describe('formatReport', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('lists each story and the totals', () => {
    const report: RunReport = {
      startedAt: new Date('2026-10-19T08:00:00.000Z'),
      completedAt: new Date('2026-10-19T08:01:00.000Z'),
      requested: 3,
      listed: 3,
      processed: 1,
      partial: 1,
      skipped: 1,
      outcomes: [
        { status: 'processed', story: makeStory({ id: '1', rank: 1, title: 'One' }), languages: ['en', 'zh'] },
        {
          status: 'partial',
          story: makeStory({ id: '2', rank: 2, title: 'Two' }),
          languages: ['en'],
          missing: [{ language: 'zh', error: 'Speech synthesis failed: HTTP 500' }],
        },
        {
          status: 'skipped',
          story: makeStory({ id: '3', rank: 3, title: 'Three' }),
          stage: 'extract',
          error: new ExtractionError('Article for story 3 is empty', { storyId: '3' }),
        },
      ],
    };

    expect(formatReport(report).split('\n')).toEqual([
      '✔ #1 One [en, zh]',
      '◐ #2 Two [en] missing audio: zh',
      '✘ #3 Three skipped at extract: Article for story 3 is empty',
      '',
      'Processed 2/3 stories (1 with missing audio), skipped 1',
    ]);
  });
});

describe('main', () => {
  let cwd: string;
  let outputDir: string;
  let frontPage: string;
  let commentTree: string;

  const completionClient: CompletionClient = {
    complete: async () => '{"primary": "A short English segment.", "secondary": "一段简短的中文。"}',
  };

  beforeAll(async () => {
    frontPage = await loadFixture('front-page.html');
    commentTree = await loadFixture('comment-tree.html');
  });

  beforeEach(async () => {
    cwd = await makeWorkspace();
    outputDir = join(await mkdtemp(join(tmpdir(), 'hn-narrator-cli-')), 'output');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function serviceFetch() {
    return stubFetch((url) => {
      if (url === 'https://news.ycombinator.com') return new Response(frontPage);
      if (url.startsWith('https://r.jina.ai/https://news.ycombinator.com/item')) return new Response(commentTree);
      if (url.startsWith('https://r.jina.ai/')) return new Response('Article text for the narrator.');
      if (url.startsWith('https://westus.tts.speech.microsoft.com/')) return new Response(new Uint8Array([1, 2, 3]));
      return new Response('unexpected', { status: 404, statusText: 'Not Found' });
    });
  }

  it('prints usage for --help', async () => {
    const fetch = serviceFetch();

    await expect(main(['--help'], { cwd, env: {}, fetch })).resolves.toBe(0);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('exits with 1 when required settings are missing', async () => {
    const fetch = serviceFetch();

    await expect(main([], { cwd, env: { LOG_LEVEL: 'error' }, fetch, completionClient })).resolves.toBe(1);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('exits with 1 on invalid arguments', async () => {
    await expect(main(['--top-n', 'ten'], { cwd, env: TEST_ENV })).resolves.toBe(1);
  });

  it('processes the top stories and writes their output', async () => {
    const listeners = process.listenerCount('SIGINT');

    const code = await main(['--top-n', '2', '--output', outputDir], {
      cwd,
      env: TEST_ENV,
      fetch: serviceFetch(),
      completionClient,
    });

    expect(code).toBe(0);
    // A single run leaves Ctrl+C to terminate the process
    expect(process.listenerCount('SIGINT')).toBe(listeners);
    expect((await readdir(outputDir)).sort()).toEqual([
      '1001.en.wav',
      '1001.json',
      '1001.zh.wav',
      '1002.en.wav',
      '1002.json',
      '1002.zh.wav',
      'run.json',
    ]);
  });

  it('exits with 1 and writes nothing when the front page is unreachable', async () => {
    const fetch = stubFetch(() => new Response('down', { status: 503, statusText: 'Service Unavailable' }));

    const code = await main(['--output', outputDir], { cwd, env: TEST_ENV, fetch, completionClient });

    expect(code).toBe(1);
    await expect(readdir(outputDir)).rejects.toThrow();
  });

  it('exits with 1 on an invalid cron expression', async () => {
    const fetch = serviceFetch();
    const onInterrupt = vi.fn();

    const code = await main(['--cron', 'whenever', '--output', outputDir], {
      cwd,
      env: TEST_ENV,
      fetch,
      completionClient,
      onInterrupt,
    });

    expect(code).toBe(1);
    expect(fetch).not.toHaveBeenCalled();
    expect(onInterrupt).not.toHaveBeenCalled();
  });

  it('runs on a schedule until interrupted', async () => {
    const stops: Array<() => void> = [];
    const fetch = serviceFetch();

    const code = await main(['--cron', '*/5 * * * *', '--top-n', '1', '--output', outputDir], {
      cwd,
      env: TEST_ENV,
      fetch,
      completionClient,
      onInterrupt: (stop) => {
        stops.push(stop);
      },
      sleep: async () => {
        stops.forEach((stop) => stop());
      },
    });

    expect(code).toBe(0);
    expect(stops).toHaveLength(1);
    expect((await readdir(outputDir)).sort()).toEqual(['1001.en.wav', '1001.json', '1001.zh.wav', 'run.json']);
  });
});
