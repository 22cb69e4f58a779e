/**
 * Summarizer
 *
 * Sends a story's article and comments to the completion service and
 * parses the bilingual summary it returns.
 */
import type { LanguagesConfig } from '../lib/config.js';
import type { CompletionClient } from '../lib/completion-client.js';
import { PipelineError, SummaryParseError, SummaryServiceError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { buildStoryMessage, buildSummarizePrompt } from '../lib/prompts.js';
import { SummaryResponseSchema, type SummaryResponse } from '../types/story-schemas.js';
import type { ExtractedContent, Story, Summary } from '../types/story.js';

const log = createLogger('summarizer');

/**
 * Pull the JSON object out of a completion: fenced block first, then the
 * outermost braces
 */
function extractJson(content: string): string | null {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    return fenced[1];
  }
  const braces = content.match(/\{[\s\S]*\}/);
  return braces ? braces[0] : null;
}

/**
 * Validate a completion against the summary contract
 */
export function parseSummaryResponse(content: string | null, storyId?: string): SummaryResponse {
  if (!content || !content.trim()) {
    throw new SummaryParseError('Completion is empty', { storyId });
  }

  const json = extractJson(content);
  if (!json) {
    throw new SummaryParseError('Completion does not contain a JSON object', { storyId });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SummaryParseError('Completion is not valid JSON', { cause: err, storyId });
  }

  const result = SummaryResponseSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
    throw new SummaryParseError(`Completion has the wrong shape (${issues.join('; ')})`, { storyId });
  }
  return result.data;
}

export class Summarizer {
  private readonly systemPrompt: string;

  constructor(
    private readonly client: CompletionClient,
    languages: LanguagesConfig
  ) {
    this.systemPrompt = buildSummarizePrompt(languages.primary, languages.secondary);
  }

  async summarize(story: Story, content: ExtractedContent): Promise<Summary> {
    const user = buildStoryMessage({
      title: story.title,
      bodyText: content.bodyText,
      comments: content.comments,
    });

    log.info(`Generating summary for ${story.id} (${user.length} chars of input)`);

    let completion: string | null;
    try {
      completion = await this.client.complete({ system: this.systemPrompt, user });
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      throw new SummaryServiceError(
        `Completion request failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err, storyId: story.id }
      );
    }

    const { primary, secondary } = parseSummaryResponse(completion, story.id);
    log.info(`Summary generated for ${story.title}`);
    log.debug(`Summary for ${story.id}:\n${primary}\n---\n${secondary}`);

    return { storyId: story.id, primary, secondary };
  }
}
