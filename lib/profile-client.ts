/**
 * Browser client for the profile API routes
 */

import { z } from 'zod';
import type { ProfileStore } from './db';
import { ProfileSaveError } from './errors';
import { profileRecordSchema } from './schema';
import type { ProfileRecord } from './types';

const profileResponseSchema = z.object({ profile: profileRecordSchema });
const profileListResponseSchema = z.object({ profiles: z.array(profileRecordSchema) });
const errorResponseSchema = z.object({ error: z.string() });

async function readError(response: Response, fallback: string): Promise<string> {
  try {
    const parsed = errorResponseSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.error : fallback;
  } catch {
    return fallback;
  }
}

export function createProfileClient(baseUrl: string = '', fetchImpl: typeof fetch = fetch): ProfileStore {
  const url = (path: string) => `${baseUrl}/api/profile${path}`;

  return {
    async listProfiles() {
      const response = await fetchImpl(url('/list'));
      if (!response.ok) {
        throw new Error(await readError(response, 'Failed to fetch profiles'));
      }
      return profileListResponseSchema.parse(await response.json()).profiles;
    },

    async loadActiveProfile() {
      const response = await fetchImpl(url(''));
      if (response.status === 404) return null;
      if (!response.ok) {
        throw new Error(await readError(response, 'Failed to fetch profile'));
      }
      return profileResponseSchema.parse(await response.json()).profile;
    },

    async saveProfile(profile: ProfileRecord) {
      let response: Response;
      try {
        response = await fetchImpl(url(''), {
          method: 'PUT',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(profile),
        });
      } catch (error) {
        throw new ProfileSaveError(profile.id, 'Failed to connect to the server', { cause: error });
      }
      if (!response.ok) {
        throw new ProfileSaveError(profile.id, await readError(response, 'Failed to save profile'));
      }
      return profileResponseSchema.parse(await response.json()).profile;
    },

    async setActiveProfile(id: string) {
      const response = await fetchImpl(url('/active'), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ id }),
      });
      if (!response.ok) {
        throw new Error(await readError(response, 'Failed to switch profile'));
      }
      return profileResponseSchema.parse(await response.json()).profile;
    },
  };
}
