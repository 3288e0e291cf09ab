import { Redis } from '@upstash/redis';
import { z } from 'zod';
import { ACTIVE_PROFILE_KEY, PROFILES_KEY, isRedisConfigured } from './config';
import { ProfileNotFoundError, ProfileSaveError, errorMessage } from './errors';
import { copyProfile } from './profile-defaults';
import { profileRecordSchema } from './schema';
import { buildSharePayload } from './share-payload';
import type { ProfileRecord } from './types';

export interface ProfileStore {
  listProfiles(): Promise<ProfileRecord[]>;
  loadActiveProfile(): Promise<ProfileRecord | null>;
  /** Persists the profile and resolves with the stored copy. Rejects with {@link ProfileSaveError}. */
  saveProfile(profile: ProfileRecord): Promise<ProfileRecord>;
  setActiveProfile(id: string): Promise<ProfileRecord>;
}

/** The slice of a key-value client the store needs. */
export interface ProfileKV {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
}

export function redisKV(redis: Redis): ProfileKV {
  return {
    get: key => redis.get<unknown>(key),
    set: async (key, value) => {
      await redis.set(key, value);
    },
  };
}

/** Keeps JSON copies, so callers never share references with the stored data. */
export function memoryKV(): ProfileKV {
  const data = new Map<string, string>();
  return {
    get: async key => {
      const raw = data.get(key);
      return raw === undefined ? null : JSON.parse(raw);
    },
    set: async (key, value) => {
      data.set(key, JSON.stringify(value));
    },
  };
}

const storedListSchema = z.array(z.unknown());

// Wrapped in an object: Upstash parses bare numeric strings back into numbers.
const activePointerSchema = z.object({ id: z.string().min(1) });

export interface ProfileStoreOptions {
  now?: () => Date;
}

export function createProfileStore(kv: ProfileKV, options: ProfileStoreOptions = {}): ProfileStore {
  const now = options.now ?? (() => new Date());

  async function readProfiles(): Promise<ProfileRecord[]> {
    const raw = await kv.get(PROFILES_KEY);
    if (raw === null) return [];

    const list = storedListSchema.safeParse(raw);
    if (!list.success) {
      console.warn('Stored profile list is malformed, ignoring it');
      return [];
    }

    const profiles: ProfileRecord[] = [];
    for (const item of list.data) {
      const parsed = profileRecordSchema.safeParse(item);
      if (parsed.success) {
        profiles.push(parsed.data);
      } else {
        console.warn('Skipping malformed stored profile:', parsed.error.issues[0]?.message);
      }
    }
    return profiles;
  }

  async function readActiveId(): Promise<string | null> {
    const raw = await kv.get(ACTIVE_PROFILE_KEY);
    if (raw === null) return null;
    const pointer = activePointerSchema.safeParse(raw);
    if (pointer.success) return pointer.data.id;
    // Pointers written as a bare id
    if (typeof raw === 'string' || typeof raw === 'number') return String(raw);
    return null;
  }

  return {
    listProfiles: readProfiles,

    async loadActiveProfile() {
      const profiles = await readProfiles();
      const activeId = await readActiveId();
      return (
        profiles.find(p => p.id === activeId) ??
        profiles.find(p => p.isActive) ??
        profiles[0] ??
        null
      );
    },

    async saveProfile(profile) {
      try {
        const timestamp = now();
        const stored: ProfileRecord = {
          ...copyProfile(profile),
          lastUpdated: timestamp.toISOString(),
          sharePayload: buildSharePayload(profile, timestamp),
        };

        const profiles = await readProfiles();
        const index = profiles.findIndex(p => p.id === stored.id);
        if (index === -1) {
          profiles.push(stored);
        } else {
          profiles[index] = stored;
        }
        await kv.set(PROFILES_KEY, profiles);

        if ((await readActiveId()) === null) {
          await kv.set(ACTIVE_PROFILE_KEY, { id: stored.id });
        }
        return copyProfile(stored);
      } catch (error) {
        throw new ProfileSaveError(profile.id, `Failed to save profile: ${errorMessage(error)}`, { cause: error });
      }
    },

    async setActiveProfile(id) {
      const profiles = await readProfiles();
      const target = profiles.find(p => p.id === id);
      if (!target) throw new ProfileNotFoundError(id);

      const updated = profiles.map(p => ({ ...p, isActive: p.id === id }));
      await kv.set(PROFILES_KEY, updated);
      await kv.set(ACTIVE_PROFILE_KEY, { id });
      return { ...copyProfile(target), isActive: true };
    },
  };
}

// Only create Redis client if configured
const redis = isRedisConfigured() ? Redis.fromEnv() : null;

if (!redis) {
  console.warn('Redis not configured - profile changes will not be persisted');
}

export const profileStore: ProfileStore = createProfileStore(redis ? redisKV(redis) : memoryKV());
