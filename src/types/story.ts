/**
 * Story Pipeline Type Definitions
 *
 * One front-page story flows through these shapes:
 * Story → ExtractedContent → Summary → AudioClip(s) → MetadataRecord
 */
import type { PipelineError, PipelineStage } from '../lib/errors.js';

export interface Story {
  id: string; // aggregator item id, e.g. "41234567"
  title: string;
  url: string; // absolute link to the article
  rank: number; // 1-based front-page position
  hackerNewsUrl: string; // discussion page
  points: number;
  commentCount: number;
}

export interface ExtractedContent {
  storyId: string;
  bodyText: string;
  /** Lazy and single-pass: iterating it a second time yields nothing */
  comments: IterableIterator<string>;
}

export interface Summary {
  storyId: string;
  primary: string; // English
  secondary: string; // second language
}

export interface AudioClip {
  storyId: string;
  language: string;
  audio: Buffer;
}

export interface SummaryText {
  language: string;
  text: string;
}

export interface AudioFileRecord {
  language: string;
  file: string; // relative to the output directory
}

/**
 * On-disk metadata for one story (<id>.json)
 */
export interface MetadataRecord {
  id: string;
  rank: number;
  title: string;
  url: string;
  hackerNewsUrl: string;
  points: number;
  commentCount: number;
  summaries: {
    primary: SummaryText;
    secondary: SummaryText;
  };
  audio: AudioFileRecord[];
  generatedAt: string;
}

export interface MissingAudio {
  language: string;
  error: string;
}

/**
 * Result of one story's pipeline
 */
export type StoryOutcome =
  | {
      status: 'processed'; // both languages narrated
      story: Story;
      languages: string[];
    }
  | {
      status: 'partial'; // metadata written, some audio missing
      story: Story;
      languages: string[];
      missing: MissingAudio[];
    }
  | {
      status: 'skipped';
      story: Story;
      stage: PipelineStage;
      error: PipelineError;
    };

export type StoryStatus = StoryOutcome['status'];

export interface RunReport {
  startedAt: Date;
  completedAt: Date;
  requested: number;
  listed: number;
  processed: number;
  partial: number;
  skipped: number;
  outcomes: StoryOutcome[];
}
