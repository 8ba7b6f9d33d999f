import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { parse } from 'yaml';
import { watch, type FSWatcher } from 'chokidar';
import { z } from 'zod';
import {
  type FeedConfig,
  ConfigError,
  FeedConfigSchema,
  formatError,
  validateConfig
} from '@podstrip/shared';
import type { LLMConfig } from '../llm/LLMOrchestrator';
import type { VolumeAnalyzerOptions } from '../audio/types';

export const AppConfigSchema = z.object({
  feeds: z.array(FeedConfigSchema).default([]),
  dataDir: z.string().min(1).default('./data'),
  baseUrl: z.string().url().default('http://localhost:8000'),
  server: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(8000),
    host: z.string().default('0.0.0.0')
  }).default({}),
  processing: z.object({
    maxJobDurationSeconds: z.coerce.number().positive().default(1800),
    acquireTimeoutSeconds: z.coerce.number().nonnegative().default(0),
    retryAfterSeconds: z.coerce.number().int().positive().default(30),
    rssRefreshMinutes: z.coerce.number().int().positive().default(15),
    ffmpegTimeoutMinutes: z.coerce.number().positive().default(60),
    tempRetentionMinutes: z.coerce.number().positive().default(120)
  }).default({}),
  volumeAnalysis: z.object({
    enabled: z.boolean().default(true),
    frameDuration: z.coerce.number().positive().default(5),
    thresholdDb: z.coerce.number().positive().default(3),
    minAnomalyDuration: z.coerce.number().nonnegative().default(15)
  }).default({}),
  llm: z.object({
    geminiApiKey: z.string().optional(),
    transcriptionModel: z.string().default('gemini-2.5-flash'),
    openrouterApiKey: z.string().optional(),
    openrouterEndpoint: z.string().url().default('https://openrouter.ai/api/v1'),
    adDetectionModel: z.string().default('anthropic/claude-sonnet-4.5'),
    maxTokens: z.coerce.number().int().positive().default(2000),
    temperature: z.coerce.number().min(0).max(2).default(0),
    timeoutMs: z.coerce.number().int().positive().default(120000)
  }).default({})
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.feeds.forEach((feed, index) => {
    if (seen.has(feed.slug)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['feeds', index, 'slug'], message: `duplicate feed slug "${feed.slug}"` });
    }
    seen.add(feed.slug);
  });
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Replaces `${VAR}` and `${VAR:-default}` in every string of a parsed YAML
 * tree. Unset variables without a default become empty; an empty value is
 * then dropped so the schema default applies.
 */
export function expandEnvironmentVariables(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    const expanded = value.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
      const envValue = env[name];
      return envValue !== undefined && envValue !== '' ? envValue : fallback ?? '';
    });
    return expanded === '' && value !== '' ? undefined : expanded;
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvironmentVariables(item, env));
  }

  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = expandEnvironmentVariables(entry, env);
    }
    return result;
  }

  return value;
}

export class ConfigManager {
  private config: AppConfig;
  private configFilePath: string;
  private watcher?: FSWatcher;
  private changeCallbacks: Set<(config: AppConfig) => void> = new Set();

  constructor(configPath: string, configFile: string = process.env.CONFIG_FILE || 'config.yaml') {
    this.configFilePath = resolve(join(configPath, configFile));
    console.log(`📋 Loading configuration from: ${this.configFilePath}`);
    this.config = this.loadConfig();
  }

  get filePath(): string {
    return this.configFilePath;
  }

  private loadConfig(): AppConfig {
    if (!existsSync(this.configFilePath)) {
      throw new ConfigError(`Configuration file not found: ${this.configFilePath}`);
    }

    let raw: unknown;
    try {
      raw = parse(readFileSync(this.configFilePath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to parse configuration: ${formatError(error)}`);
    }

    return validateConfig(AppConfigSchema, expandEnvironmentVariables(raw ?? {}));
  }

  /** Re-reads the file now. Keeps the previous config when the new one is invalid. */
  reload(): boolean {
    try {
      this.config = this.loadConfig();
    } catch (error) {
      console.error(`Failed to reload configuration: ${formatError(error)}`);
      return false;
    }
    this.notifyConfigChange();
    return true;
  }

  getFeeds(): FeedConfig[] {
    return this.config.feeds.filter(feed => feed.enabled);
  }

  getFeed(slug: string): FeedConfig | undefined {
    return this.getFeeds().find(feed => feed.slug === slug);
  }

  getProcessingConfig(): AppConfig['processing'] {
    return this.config.processing;
  }

  getVolumeAnalysisConfig(): VolumeAnalyzerOptions & { enabled: boolean } {
    return this.config.volumeAnalysis;
  }

  getLLMConfig(): LLMConfig {
    return this.config.llm;
  }

  getServerConfig(): AppConfig['server'] {
    return this.config.server;
  }

  getBaseUrl(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  getDataDirectory(): string {
    return resolve(this.config.dataDir);
  }

  getDatabaseConfig(): { path: string } {
    return { path: join(this.getDataDirectory(), 'podstrip.db') };
  }

  onConfigChange(callback: (config: AppConfig) => void): void {
    this.changeCallbacks.add(callback);
  }

  offConfigChange(callback: (config: AppConfig) => void): void {
    this.changeCallbacks.delete(callback);
  }

  startWatching(): void {
    if (this.watcher) return;

    this.watcher = watch(this.configFilePath, { ignoreInitial: true })
      .on('change', () => {
        if (this.reload()) {
          console.log('Configuration reloaded');
        }
      });

    console.log('Configuration file watching started');
  }

  async stopWatching(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = undefined;
      console.log('Configuration file watching stopped');
    }
  }

  private notifyConfigChange(): void {
    this.changeCallbacks.forEach(callback => {
      try {
        callback(this.config);
      } catch (error) {
        console.error('Error in config change callback:', error);
      }
    });
  }
}
