/**
 * Writes rendered tracks into the static output directory and builds the
 * public URL they are served from. Files are created exclusively and never
 * overwritten.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { parseFile } from 'music-metadata';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import type { PersistedTrack } from '../../types';

const MAX_NAME_ATTEMPTS = 5;

export interface AudioFileStoreOptions {
  outputDir: string;
  /** e.g. "/audio" */
  staticPath: string;
  /** e.g. "https://renderer.example.com", no trailing slash */
  publicBaseUrl: string;
  probeDuration?: boolean;
}

/** "Cell Division 101" → "cell-division-101" */
export function slugify(topicId: string): string {
  const slug = topicId
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9_-]/g, '');
  return slug || 'conversation';
}

/** 8 lowercase hex characters. */
export function shortId(): string {
  return uuidv4().replace(/-/g, '').slice(0, 8);
}

export function buildFileName(topicId: string, id: string = shortId()): string {
  return `${slugify(topicId)}_${id}.mp3`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class AudioFileStore {
  constructor(
    private readonly options: AudioFileStoreOptions,
    private readonly nextId: () => string = shortId
  ) {}

  get outputDir(): string {
    return this.options.outputDir;
  }

  async ensureOutputDir(): Promise<void> {
    await fs.mkdir(this.options.outputDir, { recursive: true });
  }

  urlFor(fileName: string): string {
    return `${this.options.publicBaseUrl}${this.options.staticPath}/${encodeURIComponent(fileName)}`;
  }

  async save(audio: Buffer, topicId: string, durationMs: number): Promise<PersistedTrack> {
    await this.ensureOutputDir();

    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const fileName = buildFileName(topicId, this.nextId());
      const filePath = path.join(this.options.outputDir, fileName);
      try {
        await fs.writeFile(filePath, audio, { flag: 'wx' });
      } catch (error) {
        if (isAlreadyExists(error)) {
          logger.warn('Audio file name collision; drawing a new id', { fileName, attempt });
          continue;
        }
        throw error;
      }

      const measured = this.options.probeDuration ? await this.probeDurationMs(filePath) : undefined;
      return {
        fileName,
        filePath,
        audioUrl: this.urlFor(fileName),
        durationMs: measured ?? durationMs,
      };
    }

    throw new Error(`Could not find a free file name for topic "${topicId}" after ${MAX_NAME_ATTEMPTS} attempts`);
  }

  private async probeDurationMs(filePath: string): Promise<number | undefined> {
    try {
      const metadata = await parseFile(filePath, { duration: true });
      const seconds = metadata.format.duration;
      if (!seconds || !isFinite(seconds) || seconds <= 0) {
        return undefined;
      }
      return Math.round(seconds * 1000);
    } catch (error) {
      logger.warn('Failed to read duration of persisted audio', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}
