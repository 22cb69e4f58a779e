/**
 * Story Pipeline
 *
 * Runs list → extract → summarize → synthesize → persist for each story.
 *
 * - Listing failure is fatal and propagates as FetchError.
 * - Failures before persistence skip the story; nothing is written for it.
 * - Synthesis is per language: a story keeps whichever clips succeeded.
 * - Every per-story failure ends as a StoryOutcome, never an exception.
 */
import pLimit from 'p-limit';
import type { Config } from './config.js';
import { getLanguages } from './config.js';
import { OpenAICompletionClient, type CompletionClient } from './completion-client.js';
import { toStageError, type PipelineStage } from './errors.js';
import { buildMetadataRecord, writeStoryOutput } from './file-storage.js';
import type { FetchLike } from './http.js';
import { createLogger } from './logger.js';
import { completeManifest, createManifest, writeManifest } from './run-manifest.js';
import { ContentExtractor } from '../workers/content-extractor.js';
import { SpeechSynthesizer } from '../workers/speech-synthesizer.js';
import { StoryLister } from '../workers/story-lister.js';
import { Summarizer } from '../workers/summarizer.js';
import type { AudioClip, MissingAudio, RunReport, Story, StoryOutcome } from '../types/story.js';

const log = createLogger('pipeline');

export interface PipelineComponents {
  lister: Pick<StoryLister, 'list'>;
  extractor: Pick<ContentExtractor, 'extract'>;
  summarizer: Pick<Summarizer, 'summarize'>;
  synthesizer: Pick<SpeechSynthesizer, 'synthesize'>;
}

export interface PipelineOptions {
  outputDir: string;
  topN: number;
  concurrency: number;
  languages: [string, string];
  model: string;
  now?: () => Date;
}

export interface ComponentDependencies {
  fetch?: FetchLike;
  completionClient?: CompletionClient;
}

/**
 * Wire the real components from configuration
 */
export function createComponents(config: Config, deps: ComponentDependencies = {}): PipelineComponents {
  const fetchImpl = deps.fetch;
  return {
    lister: new StoryLister(config.hackerNews, { fetch: fetchImpl }),
    extractor: new ContentExtractor(config.extraction, { fetch: fetchImpl }),
    summarizer: new Summarizer(deps.completionClient ?? new OpenAICompletionClient(config.completion), config.languages),
    synthesizer: new SpeechSynthesizer(config.speech, { fetch: fetchImpl }),
  };
}

export function pipelineOptionsFromConfig(config: Config): PipelineOptions {
  return {
    outputDir: config.paths.output,
    topN: config.pipeline.topN,
    concurrency: config.pipeline.concurrency,
    languages: getLanguages(config),
    model: config.completion.model,
  };
}

/**
 * Take one story through every stage
 */
export async function processStory(
  story: Story,
  components: PipelineComponents,
  options: PipelineOptions
): Promise<StoryOutcome> {
  const now = options.now ?? (() => new Date());
  const [primary, secondary] = options.languages;
  let stage: PipelineStage = 'extract';

  try {
    const content = await components.extractor.extract(story);

    stage = 'summarize';
    const summary = await components.summarizer.summarize(story, content);

    stage = 'synthesize';
    const clips: AudioClip[] = [];
    const missing: MissingAudio[] = [];
    const texts: Array<[string, string]> = [
      [primary, summary.primary],
      [secondary, summary.secondary],
    ];
    for (const [language, text] of texts) {
      try {
        clips.push(await components.synthesizer.synthesize(story.id, text, language));
      } catch (err) {
        const error = toStageError(err, 'synthesize', story.id, language);
        log.warn(`No ${language} audio for story ${story.id}: ${error.message}`);
        missing.push({ language, error: error.message });
      }
    }

    stage = 'persist';
    const record = buildMetadataRecord(story, summary, options.languages, clips, now());
    await writeStoryOutput(options.outputDir, record, clips, options.languages);

    const languages = clips.map((c) => c.language);
    if (missing.length > 0) {
      return { status: 'partial', story, languages, missing };
    }
    return { status: 'processed', story, languages };
  } catch (err) {
    const error = toStageError(err, stage, story.id);
    log.error(`Skipping story ${story.id} (${story.title}) at ${error.stage}: ${error.message}`);
    return { status: 'skipped', story, stage: error.stage, error };
  }
}

/**
 * List the front page and process every story. Throws FetchError when the
 * listing fails; in that case nothing has been written.
 */
export async function runPipeline(components: PipelineComponents, options: PipelineOptions): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  const stories = await components.lister.list(options.topN);

  let manifest = createManifest(
    {
      topN: options.topN,
      concurrency: options.concurrency,
      languages: [...options.languages],
      model: options.model,
    },
    startedAt
  );
  await writeManifest(options.outputDir, manifest);

  const limit = pLimit(options.concurrency);
  const outcomes = await Promise.all(
    stories.map((story, index) =>
      limit(() => {
        log.info(`Processing story ${index + 1}/${stories.length}: ${story.title}`);
        return processStory(story, components, options);
      })
    )
  );

  const report: RunReport = {
    startedAt,
    completedAt: now(),
    requested: options.topN,
    listed: stories.length,
    processed: outcomes.filter((o) => o.status === 'processed').length,
    partial: outcomes.filter((o) => o.status === 'partial').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    outcomes,
  };

  manifest = completeManifest(manifest, report);
  await writeManifest(options.outputDir, manifest);
  log.info(`Run ${manifest.instanceId} recorded in ${options.outputDir}/run.json`);

  return report;
}
