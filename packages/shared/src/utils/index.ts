import { z } from 'zod';
import { ConfigError } from './errors';

export function validateConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Configuration validation failed: ${issues}`);
  }
  return result.data;
}

export * from './errors';
export * from './time';
export * from './validation';
export * from './transcript';
export * from './signals';

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(1)} ${units[unitIndex]}`;
}

export function jobKey(job: { podcastSlug: string; episodeId: string }): string {
  return `${job.podcastSlug}:${job.episodeId}`;
}
