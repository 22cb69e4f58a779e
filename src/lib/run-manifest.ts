/**
 * Run Manifest Management
 *
 * Handles creation and updates of the run.json manifest.
 * The manifest makes the output directory self-documenting.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import type { RunManifest, RunOptionsRecord, StoryManifestEntry } from '../types/run.js';
import type { RunReport, StoryOutcome } from '../types/story.js';

const MANIFEST_FILENAME = 'run.json';

/**
 * Human-readable run id in local time
 * Format: run-YYYY-MM-DD-HHmmss (e.g., run-2026-01-28-014630)
 */
export function generateInstanceId(now: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `run-${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

/**
 * Create initial manifest for a new run
 */
export function createManifest(options: RunOptionsRecord, startedAt: Date = new Date()): RunManifest {
  return {
    instanceId: generateInstanceId(startedAt),
    status: 'running',
    startedAt: startedAt.toISOString(),
    options,
    stories: [],
  };
}

function toEntry(outcome: StoryOutcome): StoryManifestEntry {
  const base = {
    id: outcome.story.id,
    rank: outcome.story.rank,
    title: outcome.story.title,
    status: outcome.status,
  };

  switch (outcome.status) {
    case 'processed':
      return { ...base, languages: outcome.languages };
    case 'partial':
      return { ...base, languages: outcome.languages, missing: outcome.missing };
    case 'skipped':
      return { ...base, stage: outcome.stage, error: outcome.error.message };
  }
}

/**
 * Record the finished run
 */
export function completeManifest(manifest: RunManifest, report: RunReport): RunManifest {
  const completedAt = report.completedAt.toISOString();
  return {
    ...manifest,
    status: 'completed',
    completedAt,
    duration: report.completedAt.getTime() - new Date(manifest.startedAt).getTime(),
    counts: {
      listed: report.listed,
      processed: report.processed,
      partial: report.partial,
      skipped: report.skipped,
    },
    stories: report.outcomes.map(toEntry),
  };
}

/**
 * Read manifest from the output directory
 */
export async function readManifest(outputDir: string): Promise<RunManifest | null> {
  try {
    const content = await readFile(join(outputDir, MANIFEST_FILENAME), 'utf-8');
    return JSON.parse(content) as RunManifest;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Write manifest to the output directory
 */
export async function writeManifest(outputDir: string, manifest: RunManifest): Promise<void> {
  await mkdir(outputDir, { recursive: true });
  await writeFile(join(outputDir, MANIFEST_FILENAME), JSON.stringify(manifest, null, 2), 'utf-8');
}
