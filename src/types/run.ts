/**
 * Run Manifest Type Definitions
 *
 * run.json in the output directory documents the most recent run.
 */
import type { PipelineStage } from '../lib/errors.js';
import type { MissingAudio, StoryStatus } from './story.js';

export type RunStatus = 'running' | 'completed';

export interface StoryManifestEntry {
  id: string;
  rank: number;
  title: string;
  status: StoryStatus;
  languages?: string[]; // audio written
  missing?: MissingAudio[];
  stage?: PipelineStage; // where a skipped story failed
  error?: string;
}

export interface RunOptionsRecord {
  topN: number;
  concurrency: number;
  languages: string[];
  model: string;
}

export interface RunManifest {
  instanceId: string; // e.g. run-2026-01-28-014630
  status: RunStatus;
  startedAt: string;
  completedAt?: string;
  duration?: number; // ms
  options: RunOptionsRecord;
  counts?: {
    listed: number;
    processed: number;
    partial: number;
    skipped: number;
  };
  stories: StoryManifestEntry[];
}
