import { promises as fs, mkdirSync } from 'fs';
import { join, dirname, resolve, sep } from 'path';
import {
  type AdDetectionResult,
  type AudioAnalysisResult,
  analysisResultToJSON,
  formatFileSize,
  isValidEpisodeId,
  isValidSlug
} from '@podstrip/shared';
import type { EpisodeArtifactStore } from '../jobs/types';

export interface StorageConfig {
  dataDir: string;
}

/**
 * Local file storage. Layout under the data directory:
 *
 *   podcasts/<slug>/episodes/<id>.mp3
 *   podcasts/<slug>/episodes/<id>-transcript.txt
 *   podcasts/<slug>/episodes/<id>-ads.json
 *   podcasts/<slug>/episodes/<id>-analysis.json
 *   podcasts/<slug>/modified-rss.xml
 *   temp/
 */
export class StorageManager implements EpisodeArtifactStore {
  private dataDir: string;

  constructor(config: StorageConfig) {
    this.dataDir = resolve(config.dataDir);
    mkdirSync(this.getTempDirectory(), { recursive: true });
  }

  getDataDirectory(): string {
    return this.dataDir;
  }

  getTempDirectory(): string {
    return join(this.dataDir, 'temp');
  }

  getPodcastDirectory(podcastSlug: string): string {
    if (!isValidSlug(podcastSlug)) {
      throw new Error(`Invalid podcast slug: ${podcastSlug}`);
    }
    return join(this.dataDir, 'podcasts', podcastSlug);
  }

  // ========== RSS ==========

  async saveRSSFeed(podcastSlug: string, xml: string): Promise<void> {
    await this.writeAtomic(join(this.getPodcastDirectory(podcastSlug), 'modified-rss.xml'), xml);
  }

  async getRSSFeed(podcastSlug: string): Promise<{ xml: string; modifiedAt: Date } | null> {
    const filePath = join(this.getPodcastDirectory(podcastSlug), 'modified-rss.xml');
    try {
      const [xml, stats] = await Promise.all([fs.readFile(filePath, 'utf8'), fs.stat(filePath)]);
      return { xml, modifiedAt: stats.mtime };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  // ========== EPISODE ARTIFACTS ==========

  async loadTranscript(podcastSlug: string, episodeId: string): Promise<string | null> {
    return this.readOptional(this.episodeFile(podcastSlug, episodeId, '-transcript.txt'));
  }

  async saveTranscript(podcastSlug: string, episodeId: string, transcript: string): Promise<void> {
    await this.writeAtomic(this.episodeFile(podcastSlug, episodeId, '-transcript.txt'), transcript);
  }

  async saveAdDetection(podcastSlug: string, episodeId: string, result: AdDetectionResult): Promise<void> {
    const payload = { ...result, savedAt: new Date().toISOString() };
    await this.writeAtomic(this.episodeFile(podcastSlug, episodeId, '-ads.json'), JSON.stringify(payload, null, 2));
  }

  async loadAdDetection(podcastSlug: string, episodeId: string): Promise<string | null> {
    return this.readOptional(this.episodeFile(podcastSlug, episodeId, '-ads.json'));
  }

  async saveAnalysis(podcastSlug: string, episodeId: string, result: AudioAnalysisResult): Promise<void> {
    const json = JSON.stringify(analysisResultToJSON(result), null, 2);
    await this.writeAtomic(this.episodeFile(podcastSlug, episodeId, '-analysis.json'), json);
  }

  /**
   * Moves edited audio into the podcast's episode directory and returns its
   * path relative to the podcast directory.
   */
  async storeEpisodeAudio(podcastSlug: string, episodeId: string, sourcePath: string): Promise<string> {
    const relativePath = `episodes/${episodeId}.mp3`;
    const targetPath = this.episodeFile(podcastSlug, episodeId, '.mp3');
    const tempPath = `${targetPath}.${process.pid}.tmp`;

    await fs.mkdir(dirname(targetPath), { recursive: true });
    await fs.copyFile(sourcePath, tempPath);
    await fs.rename(tempPath, targetPath);

    const stats = await fs.stat(targetPath);
    console.log(`💾 Stored ${podcastSlug}/${relativePath} (${formatFileSize(stats.size)})`);
    return relativePath;
  }

  /** Absolute path of a stored artifact; refuses paths escaping the podcast directory. */
  resolveProcessedFile(podcastSlug: string, processedFile: string): string {
    const podcastDir = this.getPodcastDirectory(podcastSlug);
    const fullPath = resolve(podcastDir, processedFile);
    if (!fullPath.startsWith(podcastDir + sep)) {
      throw new Error(`Processed file outside podcast directory: ${processedFile}`);
    }
    return fullPath;
  }

  async artifactExists(podcastSlug: string, processedFile: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolveProcessedFile(podcastSlug, processedFile));
      return stats.isFile() && stats.size > 0;
    } catch {
      return false;
    }
  }

  async deleteEpisodeFiles(podcastSlug: string, episodeId: string): Promise<number> {
    let deleted = 0;
    for (const suffix of ['.mp3', '-ads.json', '-analysis.json']) {
      try {
        await fs.unlink(this.episodeFile(podcastSlug, episodeId, suffix));
        deleted++;
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
    return deleted;
  }

  /** Removes temp files older than the given age. Returns the count removed. */
  async cleanupTempFiles(olderThanMinutes: number): Promise<number> {
    const cutoff = Date.now() - olderThanMinutes * 60 * 1000;
    const tempDir = this.getTempDirectory();
    let deletedCount = 0;

    const entries = await fs.readdir(tempDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const filePath = join(tempDir, entry.name);
      try {
        const stats = await fs.stat(filePath);
        if (stats.mtimeMs < cutoff) {
          await fs.unlink(filePath);
          deletedCount++;
        }
      } catch (error) {
        console.error(`Failed to delete temp file ${filePath}:`, error);
      }
    }

    if (deletedCount > 0) {
      console.log(`🧹 Cleanup completed: ${deletedCount} temp files deleted`);
    }
    return deletedCount;
  }

  private episodeFile(podcastSlug: string, episodeId: string, suffix: string): string {
    if (!isValidEpisodeId(episodeId)) {
      throw new Error(`Invalid episode id: ${episodeId}`);
    }
    return join(this.getPodcastDirectory(podcastSlug), 'episodes', `${episodeId}${suffix}`);
  }

  private async readOptional(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private async writeAtomic(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
