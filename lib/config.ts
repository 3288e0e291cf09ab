export const BLUR_MIN = 0;
export const BLUR_MAX = 18;

export const RECENT_COMBINATIONS_LIMIT = 3;
export const MAX_CUSTOM_LINKS = 3;

/** Share payloads older than this are rebuilt before sharing. */
export const SHARE_PAYLOAD_TTL_MS = 5 * 60 * 1000;

export const SHARE_APP_ID = 'cs';
export const SHARE_PAYLOAD_VERSION = '1';

export const PROFILES_KEY = 'card-studio:profiles:v1';
export const ACTIVE_PROFILE_KEY = 'card-studio:active-profile:v1';

export function isRedisConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!(env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN);
}
