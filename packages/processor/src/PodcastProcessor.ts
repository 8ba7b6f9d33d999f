import cron, { type ScheduledTask } from 'node-cron';
import { formatError } from '@podstrip/shared';
import { type AppConfig, ConfigManager } from './config/ConfigManager';
import { Database } from './database/Database';
import { RSSProcessor } from './rss/RSSProcessor';
import { StorageManager } from './storage/StorageManager';
import { AudioProcessor } from './audio/AudioProcessor';
import { VolumeAnalyzer } from './audio/VolumeAnalyzer';
import { LLMOrchestrator } from './llm/LLMOrchestrator';
import { FileStatusSource } from './jobs/FileStatusSource';
import { ProcessingScheduler } from './jobs/ProcessingScheduler';
import { EpisodeWorker } from './jobs/workers/EpisodeWorker';
import { FeedService } from './services/FeedService';
import { EpisodeService } from './services/EpisodeService';
import type { APIDependencies } from './api/server';

interface Services {
  database: Database;
  storage: StorageManager;
  llm: LLMOrchestrator;
  scheduler: ProcessingScheduler;
  feeds: FeedService;
  episodes: EpisodeService;
}

export class PodcastProcessor {
  private config: ConfigManager;
  private services?: Services;
  private cronJobs: Map<string, ScheduledTask> = new Map();
  private isRunning: boolean = false;
  private startedAt = new Date();
  private configListener?: (config: AppConfig) => void;

  constructor(configPath: string = './config', configFile?: string) {
    this.config = new ConfigManager(configPath, configFile);
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      console.log('PodcastProcessor already running');
      return;
    }

    console.log('Starting PodcastProcessor...');
    const services = await this.initializeServices();
    this.services = services;
    this.startedAt = new Date();

    const recovered = services.episodes.recoverAbandoned();
    if (recovered > 0) {
      console.log(`Recovered ${recovered} abandoned episodes`);
    }

    this.setupCronJobs(services);
    this.configListener = config => {
      console.log(`📋 Configuration changed: ${config.feeds.length} feeds configured, refreshing`);
      services.feeds.refreshAll()
        .then(({ refreshed, failed }) => console.log(`Feed refresh after config change: ${refreshed} refreshed, ${failed} failed`))
        .catch(error => console.error(`Feed refresh after config change failed: ${formatError(error)}`));
    };
    this.config.onConfigChange(this.configListener);
    this.config.startWatching();
    this.isRunning = true;
    console.log('PodcastProcessor started successfully');

    const { refreshed, failed } = await services.feeds.refreshAll();
    console.log(`Initial feed refresh: ${refreshed} refreshed, ${failed} failed`);
  }

  async stop(): Promise<void> {
    console.log('Stopping PodcastProcessor...');

    this.cronJobs.forEach((job, name) => {
      console.log(`Stopping cron job: ${name}`);
      job.stop();
    });
    this.cronJobs.clear();

    await this.config.stopWatching();
    if (this.configListener) {
      this.config.offConfigChange(this.configListener);
      this.configListener = undefined;
    }

    if (this.services) {
      await this.services.episodes.drain();
      await this.services.scheduler.flush();
      const usage = this.services.llm.getTotalUsage();
      console.log(`LLM usage: ${usage.calls} calls, ${usage.inputTokens} input / ${usage.outputTokens} output tokens`);
      this.services.database.close();
      this.services = undefined;
    }

    this.isRunning = false;
    console.log('PodcastProcessor stopped');
  }

  getConfig(): ConfigManager {
    return this.config;
  }

  getAPIDependencies(): APIDependencies {
    const services = this.requireServices();
    return {
      episodes: services.episodes,
      feeds: services.feeds,
      database: services.database,
      scheduler: services.scheduler,
      storage: services.storage,
      baseUrl: this.config.getBaseUrl(),
      startedAt: this.startedAt
    };
  }

  async cleanup(): Promise<void> {
    const services = this.requireServices();
    const deleted = await services.storage.cleanupTempFiles(this.config.getProcessingConfig().tempRetentionMinutes);
    const recovered = services.episodes.recoverAbandoned();
    console.log(`🧹 Cleanup: ${deleted} temp files removed, ${recovered} abandoned episodes recovered`);
  }

  private requireServices(): Services {
    if (!this.services) {
      throw new Error('PodcastProcessor is not started');
    }
    return this.services;
  }

  private async initializeServices(): Promise<Services> {
    const processingConfig = this.config.getProcessingConfig();
    const volumeConfig = this.config.getVolumeAnalysisConfig();
    const maxJobDurationMs = processingConfig.maxJobDurationSeconds * 1000;

    const database = new Database(this.config.getDatabaseConfig());
    const storage = new StorageManager({ dataDir: this.config.getDataDirectory() });
    const audio = new AudioProcessor({
      tempDirectory: storage.getTempDirectory(),
      timeoutMs: processingConfig.ffmpegTimeoutMinutes * 60 * 1000
    });
    const llm = new LLMOrchestrator(this.config.getLLMConfig());
    const rss = new RSSProcessor();

    const scheduler = new ProcessingScheduler({
      maxJobDurationMs,
      statusSource: new FileStatusSource({ dataDir: storage.getDataDirectory(), maxJobDurationMs })
    });

    const worker = new EpisodeWorker({
      audio,
      transcriber: llm,
      adDetector: llm,
      storage,
      volumeAnalyzer: volumeConfig.enabled ? new VolumeAnalyzer(audio, volumeConfig) : undefined
    });

    const feeds = new FeedService(this.config, rss, storage, database, {
      baseUrl: this.config.getBaseUrl(),
      rssRefreshMinutes: processingConfig.rssRefreshMinutes
    });

    const episodes = new EpisodeService(database, storage, feeds, scheduler, worker, {
      acquireTimeoutMs: processingConfig.acquireTimeoutSeconds * 1000,
      retryAfterSeconds: processingConfig.retryAfterSeconds,
      maxJobDurationMs
    });

    console.log('Testing service connections...');
    if (await audio.isAvailable()) {
      console.log('✓ ffmpeg available');
    } else {
      console.warn('⚠️  ffmpeg not found; episodes will fail and redirect to the original audio');
    }
    console.log('✓ All services initialized');

    return { database, storage, llm, scheduler, feeds, episodes };
  }

  private setupCronJobs(services: Services): void {
    console.log('Setting up scheduled tasks...');

    const refreshMinutes = Math.min(this.config.getProcessingConfig().rssRefreshMinutes, 59);
    const refreshJob = cron.schedule(`*/${refreshMinutes} * * * *`, async () => {
      console.log('Running scheduled feed refresh...');
      await services.feeds.refreshAll();
    });
    this.cronJobs.set('refresh-feeds', refreshJob);

    const cleanupJob = cron.schedule('0 * * * *', async () => {
      console.log('Running scheduled cleanup...');
      try {
        await this.cleanup();
      } catch (error) {
        console.error(`Cleanup failed: ${formatError(error)}`);
      }
    });
    this.cronJobs.set('cleanup', cleanupJob);

    console.log('✓ Scheduled tasks configured');
  }
}
