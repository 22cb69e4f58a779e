/**
 * Prompt Templates
 *
 * The system prompt and the response shape form a fixed contract with the
 * completion service: the summarizer rejects anything that is not a JSON
 * object with both fields.
 */

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  zh: 'Chinese',
  ja: 'Japanese',
  ko: 'Korean',
  de: 'German',
  fr: 'French',
  es: 'Spanish',
};

export function languageName(tag: string): string {
  return LANGUAGE_NAMES[tag] ?? tag;
}

/**
 * System prompt for summarizing one story
 */
export function buildSummarizePrompt(primary: string, secondary: string): string {
  return `You are the editor of a daily Hacker News podcast. You turn a story's article and its discussion into a short spoken segment for software developers and tech enthusiasts.

## Objectives
- Introduce the main topic of the article in a sentence or two, then explain its key points.
- Summarize the range of opinions in the comments so listeners hear several perspectives.
- Write the way you would explain it to a friend: clear, direct, conversational.
- The text will be read aloud. Do not use markdown or symbols such as **, *, # or bullet points.

## Output
Write the segment in ${languageName(primary)} and in ${languageName(secondary)}.
Respond with a single JSON object and nothing else:
{"primary": "<${languageName(primary)} segment>", "secondary": "<${languageName(secondary)} segment>"}`;
}

export interface StoryPromptInput {
  title: string;
  bodyText: string;
  comments: Iterable<string>;
}

/**
 * User message: tagged sections separated by ---, empty sections omitted
 */
export function buildStoryMessage(input: StoryPromptInput): string {
  const comments = Array.from(input.comments).join('\n\n');
  const parts: string[] = [];

  if (input.title) {
    parts.push(`<title>\n${input.title}\n</title>`);
  }
  if (input.bodyText) {
    parts.push(`<article>\n${input.bodyText}\n</article>`);
  }
  if (comments) {
    parts.push(`<comments>\n${comments}\n</comments>`);
  }

  return parts.join('\n\n---\n\n');
}
