/**
 * File Storage Operations
 *
 * Writes each story's metadata (<id>.json) and narration
 * (<id>.<language>.wav) into the output directory, and reads metadata back.
 * Paths derive from the story id alone, so a re-run overwrites in place.
 */
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { WriteError } from './errors.js';
import { MetadataRecordSchema } from '../types/story-schemas.js';
import type { AudioClip, MetadataRecord, Story, Summary } from '../types/story.js';

const STORY_ID_PATTERN = /^\d+$/;
const LANGUAGE_PATTERN = /^[A-Za-z0-9-]+$/;

export function metadataFileName(storyId: string): string {
  return `${storyId}.json`;
}

export function audioFileName(storyId: string, language: string): string {
  return `${storyId}.${language}.wav`;
}

export function metadataPath(outputDir: string, storyId: string): string {
  return join(outputDir, metadataFileName(storyId));
}

export function audioPath(outputDir: string, storyId: string, language: string): string {
  return join(outputDir, audioFileName(storyId, language));
}

/**
 * Combine a story, its summary and the clips that were produced
 */
export function buildMetadataRecord(
  story: Story,
  summary: Summary,
  languages: [string, string],
  clips: AudioClip[],
  generatedAt: Date = new Date()
): MetadataRecord {
  const [primary, secondary] = languages;
  return {
    id: story.id,
    rank: story.rank,
    title: story.title,
    url: story.url,
    hackerNewsUrl: story.hackerNewsUrl,
    points: story.points,
    commentCount: story.commentCount,
    summaries: {
      primary: { language: primary, text: summary.primary },
      secondary: { language: secondary, text: summary.secondary },
    },
    audio: clips.map((clip) => ({
      language: clip.language,
      file: audioFileName(story.id, clip.language),
    })),
    generatedAt: generatedAt.toISOString(),
  };
}

function assertSafeNames(outputDir: string, storyId: string, languages: string[]): void {
  if (!STORY_ID_PATTERN.test(storyId)) {
    throw new WriteError(`Refusing to write story with id "${storyId}"`, {
      storyId,
      path: outputDir,
    });
  }
  const bad = languages.find((l) => !LANGUAGE_PATTERN.test(l));
  if (bad !== undefined) {
    throw new WriteError(`Refusing to write audio for language "${bad}"`, { storyId, path: outputDir });
  }
}

/**
 * Remove every file belonging to a story
 */
export async function removeStoryOutput(outputDir: string, storyId: string, languages: string[]): Promise<void> {
  assertSafeNames(outputDir, storyId, languages);
  await Promise.all([
    rm(metadataPath(outputDir, storyId), { force: true }),
    ...languages.map((language) => rm(audioPath(outputDir, storyId, language), { force: true })),
  ]);
}

/**
 * Write metadata and audio for one story, overwriting earlier output.
 * Audio for `languages` not among `clips` is deleted so no stale narration
 * survives a re-run. On failure the story's files are removed.
 */
export async function writeStoryOutput(
  outputDir: string,
  record: MetadataRecord,
  clips: AudioClip[],
  languages: string[]
): Promise<string[]> {
  assertSafeNames(outputDir, record.id, [...languages, ...clips.map((c) => c.language)]);

  const written: string[] = [];
  let currentPath = outputDir;

  try {
    await mkdir(outputDir, { recursive: true });

    currentPath = metadataPath(outputDir, record.id);
    await writeFile(currentPath, JSON.stringify(record, null, 2), 'utf-8');
    written.push(currentPath);

    for (const clip of clips) {
      currentPath = audioPath(outputDir, record.id, clip.language);
      await writeFile(currentPath, clip.audio);
      written.push(currentPath);
    }

    const produced = new Set(clips.map((c) => c.language));
    for (const language of languages.filter((l) => !produced.has(l))) {
      currentPath = audioPath(outputDir, record.id, language);
      await rm(currentPath, { force: true });
    }
  } catch (err) {
    const cleanupLanguages = [...new Set([...languages, ...clips.map((c) => c.language)])];
    await removeStoryOutput(outputDir, record.id, cleanupLanguages).catch((cleanupErr: unknown) => {
      throw new WriteError(`Could not clean up after failed write of ${currentPath}`, {
        cause: cleanupErr,
        storyId: record.id,
        path: currentPath,
      });
    });
    throw new WriteError(
      `Could not write ${currentPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err, storyId: record.id, path: currentPath }
    );
  }

  return written;
}

/**
 * Read and validate a story's metadata file
 */
export async function readStoryMetadata(outputDir: string, storyId: string): Promise<MetadataRecord> {
  const path = metadataPath(outputDir, storyId);
  const content = await readFile(path, 'utf-8');
  return MetadataRecordSchema.parse(JSON.parse(content));
}
