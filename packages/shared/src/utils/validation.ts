const EPISODE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isValidEpisodeId(id: string): boolean {
  return EPISODE_ID_PATTERN.test(id) && id.length <= 100;
}

export function isValidSlug(slug: string): boolean {
  return EPISODE_ID_PATTERN.test(slug) && slug.length <= 100;
}
