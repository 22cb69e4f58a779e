/**
 * Content Extractor
 *
 * Turns a story into article text plus its top comments, both fetched
 * through the reader proxy (r.jina.ai by default):
 * - the article comes back as cleaned text
 * - the discussion page comes back as HTML narrowed to the comment tree,
 *   which is parsed lazily as the comments are consumed
 */
import * as cheerio from 'cheerio';
import type { ExtractionConfig } from '../lib/config.js';
import { ExtractionError } from '../lib/errors.js';
import { describeStatus, fetchWithTimeout, type FetchLike } from '../lib/http.js';
import { createLogger } from '../lib/logger.js';
import type { ExtractedContent, Story } from '../types/story.js';

const log = createLogger('content-extractor');

export interface ContentExtractorOptions {
  fetch?: FetchLike;
}

/** Blank line between comments in the summary prompt */
const COMMENT_SEPARATOR_LENGTH = 2;

/**
 * Yield comment texts from comment-tree HTML, at most `limit` of them and
 * at most `maxChars` once joined by blank lines. The comment that crosses
 * the budget is cut and ends the sequence.
 * Nothing is parsed until the first comment is requested.
 */
export function* iterateComments(
  html: string,
  limit: number,
  maxChars = Number.POSITIVE_INFINITY
): Generator<string, void, undefined> {
  if (limit <= 0) return;

  const $ = cheerio.load(html);
  let yielded = 0;
  let used = 0;

  for (const element of $('.commtext').toArray()) {
    const $comment = $(element);
    $comment.find('.reply').remove();
    // Paragraphs would otherwise run together
    $comment.find('p').prepend('\n');

    const text = $comment.text().replace(/\s+/g, ' ').trim();
    if (!text) continue;

    const room = maxChars - used - (yielded > 0 ? COMMENT_SEPARATOR_LENGTH : 0);
    const piece = text.slice(0, Math.max(0, room)).trimEnd();
    if (!piece) return;

    yield piece;
    used += (yielded > 0 ? COMMENT_SEPARATOR_LENGTH : 0) + piece.length;
    yielded++;
    if (yielded >= limit || piece.length < text.length) return;
  }
}

export class ContentExtractor {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: ExtractionConfig,
    options: ContentExtractorOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async extract(story: Story): Promise<ExtractedContent> {
    log.info(`Fetching article for ${story.id} from: ${story.url}`);
    const article = await this.read(story, story.url, { 'X-Retain-Images': 'none' });
    const bodyText = article.trim().slice(0, this.config.maxChars);
    if (!bodyText) {
      throw new ExtractionError(`Article for story ${story.id} is empty`, { storyId: story.id });
    }

    log.info(`Fetching comments for ${story.id} from: ${story.hackerNewsUrl}`);
    const commentsHtml = await this.read(story, story.hackerNewsUrl, {
      'X-Retain-Images': 'none',
      'X-Return-Format': 'html',
      'X-Remove-Selector': '.navs',
      'X-Target-Selector': '.comment-tree',
    });

    return {
      storyId: story.id,
      bodyText,
      comments: iterateComments(commentsHtml, this.config.maxComments, this.config.maxChars),
    };
  }

  /**
   * One proxied GET; every failure becomes an ExtractionError
   */
  private async read(story: Story, target: string, headers: Record<string, string>): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/${target}`;
    const requestHeaders: Record<string, string> = { ...headers };
    if (this.config.apiKey) {
      requestHeaders.Authorization = `Bearer ${this.config.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetchWithTimeout(this.fetchImpl, url, { headers: requestHeaders }, this.config.timeout);
    } catch (err) {
      throw new ExtractionError(`Could not reach ${target}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
        storyId: story.id,
      });
    }

    if (!response.ok) {
      throw new ExtractionError(`Extraction of ${target} failed: ${describeStatus(response)}`, {
        storyId: story.id,
      });
    }

    try {
      return await response.text();
    } catch (err) {
      throw new ExtractionError(`Could not read extraction of ${target}`, { cause: err, storyId: story.id });
    }
  }
}
