/**
 * Story Lister
 *
 * Fetches the Hacker News front page and parses its story rows.
 * A failure here aborts the run: there is nothing to process without it.
 */
import * as cheerio from 'cheerio';
import type { HackerNewsConfig } from '../lib/config.js';
import { FetchError } from '../lib/errors.js';
import { describeStatus, fetchWithTimeout, type FetchLike } from '../lib/http.js';
import { createLogger } from '../lib/logger.js';
import type { Story } from '../types/story.js';

const log = createLogger('story-lister');

export interface StoryListerOptions {
  fetch?: FetchLike;
}

/**
 * Pull the first integer out of strings like "123 points" or "45 comments"
 */
function parseCount(text: string | undefined): number {
  const match = text?.match(/\d+/);
  return match ? Number.parseInt(match[0], 10) : 0;
}

/**
 * Resolve a story link against the front page; self posts link to "item?id=…"
 */
function resolveLink(href: string, baseUrl: string): string {
  try {
    return new URL(href, `${baseUrl}/`).toString();
  } catch {
    return href;
  }
}

/**
 * Parse front-page HTML into stories, in page order
 */
export function parseFrontPage(html: string, baseUrl: string): Story[] {
  const $ = cheerio.load(html);
  const stories: Story[] = [];

  $('tr.athing').each((index, row) => {
    const $row = $(row);
    const id = $row.attr('id') ?? '';
    const $link = $row.find('.titleline > a').first();
    const title = $link.text().trim();
    const href = $link.attr('href');

    if (!/^\d+$/.test(id) || !title || !href) {
      log.debug(`Skipping row ${index}: missing id, title or link`);
      return;
    }

    const rank = Number.parseInt($row.find('.rank').text(), 10);
    const $subtext = $row.next('tr').find('.subtext');
    // The age link also points at item?id=…; job posts have no comment link
    const commentsText = $subtext
      .find('a[href^="item?id="]')
      .filter((_, a) => /comment|discuss/i.test($(a).text()))
      .last()
      .text();

    stories.push({
      id,
      title,
      url: resolveLink(href, baseUrl),
      rank: Number.isNaN(rank) ? stories.length + 1 : rank,
      hackerNewsUrl: `${baseUrl}/item?id=${id}`,
      points: parseCount($subtext.find('.score').text()),
      commentCount: parseCount(commentsText),
    });
  });

  return stories;
}

export class StoryLister {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: HackerNewsConfig,
    options: StoryListerOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Up to `count` stories, ordered by front-page rank
   */
  async list(count: number): Promise<Story[]> {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Story count must be a positive integer, got ${count}`);
    }

    const url = this.config.baseUrl;
    log.info(`Fetching stories from ${url}`);

    let html: string;
    try {
      const response = await fetchWithTimeout(
        this.fetchImpl,
        url,
        { headers: { 'User-Agent': this.config.userAgent } },
        this.config.timeout
      );
      if (!response.ok) {
        throw new FetchError(`Front page request failed: ${describeStatus(response)}`);
      }
      html = await response.text();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(`Front page unreachable: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    const stories = parseFrontPage(html, url.replace(/\/+$/, ''))
      .sort((a, b) => a.rank - b.rank)
      .slice(0, count);

    for (const story of stories) {
      log.debug(`Found story #${story.rank}: ${story.title} (${story.points} points, ${story.commentCount} comments)`);
    }
    log.info(`Listed ${stories.length} stories (requested ${count})`);
    return stories;
  }
}
