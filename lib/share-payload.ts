import { SHARE_APP_ID, SHARE_PAYLOAD_TTL_MS, SHARE_PAYLOAD_VERSION } from './config';
import type { ProfileRecord } from './types';

export interface EssentialFields {
  n: string;
  p?: string;
  c?: string;
  e?: string;
}

export interface SharePayload {
  a: string;
  v: string;
  d: EssentialFields;
  t: number;
}

function filled(value: string | null): value is string {
  return value !== null && value !== '';
}

/** The few fields that fit on a small NFC tag, under one-letter keys. */
export function essentialFields(profile: ProfileRecord): EssentialFields {
  const essentials: EssentialFields = { n: profile.name };

  if (filled(profile.phone)) essentials.p = profile.phone;
  if (profile.type === 'professional' && filled(profile.company)) essentials.c = profile.company;
  if (filled(profile.email)) essentials.e = profile.email;

  return essentials;
}

export function buildSharePayload(profile: ProfileRecord, now: Date = new Date()): string {
  const payload: SharePayload = {
    a: SHARE_APP_ID,
    v: SHARE_PAYLOAD_VERSION,
    d: essentialFields(profile),
    t: Math.round(now.getTime() / 1000),
  };
  return JSON.stringify(payload);
}

function payloadTimestamp(payload: string): number | null {
  try {
    const parsed: unknown = JSON.parse(payload);
    if (parsed && typeof parsed === 'object' && 't' in parsed && typeof parsed.t === 'number') {
      return parsed.t;
    }
    return null;
  } catch {
    return null;
  }
}

export function needsPayloadRefresh(payload: string | null, now: Date = new Date()): boolean {
  if (payload === null) return true;
  const seconds = payloadTimestamp(payload);
  if (seconds === null) return true;
  return now.getTime() - seconds * 1000 > SHARE_PAYLOAD_TTL_MS;
}

/** Cached payload while it is fresh, otherwise a rebuilt one. */
export function freshSharePayload(profile: ProfileRecord, now: Date = new Date()): string {
  if (profile.sharePayload !== null && !needsPayloadRefresh(profile.sharePayload, now)) {
    return profile.sharePayload;
  }
  return buildSharePayload(profile, now);
}
