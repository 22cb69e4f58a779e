/**
 * Pipeline Errors
 *
 * Every stage reports failure through a subclass of PipelineError so the
 * story boundary can tell which stage dropped a story.
 */

export type PipelineStage = 'list' | 'extract' | 'summarize' | 'synthesize' | 'persist';

interface PipelineErrorOptions {
  cause?: unknown;
  storyId?: string;
}

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;
  readonly storyId?: string;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.storyId = options.storyId;
  }
}

/** Front page could not be listed */
export class FetchError extends PipelineError {
  readonly stage = 'list';
}

/** Extraction proxy failed for a story */
export class ExtractionError extends PipelineError {
  readonly stage = 'extract';
}

/** Completion endpoint returned an error status or could not be reached */
export class SummaryServiceError extends PipelineError {
  readonly stage = 'summarize';
  readonly status?: number;

  constructor(message: string, options: PipelineErrorOptions & { status?: number } = {}) {
    super(message, options);
    this.status = options.status;
  }
}

/** Completion came back but not in the expected shape */
export class SummaryParseError extends PipelineError {
  readonly stage = 'summarize';
}

export class SynthesisError extends PipelineError {
  readonly stage = 'synthesize';
  readonly language: string;

  constructor(message: string, options: PipelineErrorOptions & { language: string }) {
    super(message, options);
    this.language = options.language;
  }
}

export class WriteError extends PipelineError {
  readonly stage = 'persist';
  readonly path: string;

  constructor(message: string, options: PipelineErrorOptions & { path: string }) {
    super(message, options);
    this.path = options.path;
  }
}

/**
 * Invalid or incomplete configuration. Not tied to a story.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  • ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Wrap an arbitrary error into the error type of the stage it escaped from
 */
export function toStageError(err: unknown, stage: PipelineStage, storyId: string, language = ''): PipelineError {
  if (err instanceof PipelineError) {
    return err;
  }
  const message = describeError(err);
  switch (stage) {
    case 'list':
      return new FetchError(message, { cause: err, storyId });
    case 'extract':
      return new ExtractionError(message, { cause: err, storyId });
    case 'summarize':
      return new SummaryServiceError(message, { cause: err, storyId });
    case 'synthesize':
      return new SynthesisError(message, { cause: err, storyId, language });
    case 'persist':
      return new WriteError(message, { cause: err, storyId, path: '' });
  }
}

/**
 * Render an error for log output
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return typeof err === 'string' ? err : 'Unknown error';
}
