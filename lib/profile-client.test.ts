import { describe, expect, it, vi } from 'vitest';
import { ProfileSaveError } from './errors';
import { createProfileClient } from './profile-client';
import { createEmptyProfile } from './profile-defaults';

const profile = { ...createEmptyProfile('personal', new Date('2026-01-01T00:00:00Z')), id: 'p1', name: 'Alice' };

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('createProfileClient', () => {
  it('loads the active profile', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ profile }));
    const client = createProfileClient('http://localhost:3000', fetchImpl);

    expect(await client.loadActiveProfile()).toEqual(profile);
    expect(fetchImpl).toHaveBeenCalledWith('http://localhost:3000/api/profile');
  });

  it('returns null when no profile exists', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'No profile found' }, 404));
    const client = createProfileClient('', fetchImpl);

    expect(await client.loadActiveProfile()).toBeNull();
  });

  it('sends saves as PUT', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ success: true, profile }));
    const client = createProfileClient('', fetchImpl);

    await client.saveProfile(profile);

    expect(fetchImpl).toHaveBeenCalledWith('/api/profile', {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(profile),
    });
  });

  it('surfaces the server message on a failed save', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'Failed to save profile: timeout' }, 500));
    const client = createProfileClient('', fetchImpl);

    const saving = client.saveProfile(profile);
    await expect(saving).rejects.toBeInstanceOf(ProfileSaveError);
    await expect(saving).rejects.toThrow('Failed to save profile: timeout');
  });

  it('wraps network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    const client = createProfileClient('', fetchImpl);

    await expect(client.saveProfile(profile)).rejects.toThrow('Failed to connect to the server');
  });
});
