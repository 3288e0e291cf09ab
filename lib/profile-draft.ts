import { changedFields, isDirty } from './change-detector';
import { DraftNotLoadedError } from './errors';
import { copyProfile, normalizeForSave } from './profile-defaults';
import type { ProfileRecord, SaveResult } from './types';

export type ProfileUpdater = (profile: ProfileRecord) => ProfileRecord;

/** Anything that can persist a profile and hand back the stored copy. */
export interface ProfileSaver {
  saveProfile(profile: ProfileRecord): Promise<ProfileRecord>;
}

interface DraftState {
  initial: ProfileRecord;
  current: ProfileRecord;
}

/**
 * Working copy of a profile plus the snapshot it was loaded from. The snapshot
 * only advances on {@link commit}, which {@link save} calls after the store
 * accepts the profile. Saves send the cleaned form of the draft and, once
 * stored, the draft takes on the cleaned copy.
 */
export class ProfileDraft {
  private state: DraftState | null = null;
  private pendingSave: Promise<SaveResult> | null = null;

  get isLoaded(): boolean {
    return this.state !== null;
  }

  get current(): ProfileRecord | null {
    return this.state ? copyProfile(this.state.current) : null;
  }

  get initial(): ProfileRecord | null {
    return this.state ? copyProfile(this.state.initial) : null;
  }

  load(record: ProfileRecord): void {
    this.state = { initial: copyProfile(record), current: copyProfile(record) };
  }

  mutate(updater: ProfileUpdater): ProfileRecord {
    const state = this.require('edit');
    state.current = copyProfile(updater(copyProfile(state.current)));
    return copyProfile(state.current);
  }

  commit(saved?: ProfileRecord): void {
    const state = this.require('commit');
    if (saved) state.current = copyProfile(saved);
    state.initial = copyProfile(state.current);
  }

  isDirty(): boolean {
    return this.state ? isDirty(this.state.current, this.state.initial) : false;
  }

  changedFields(): string[] {
    return this.state ? changedFields(this.state.current, this.state.initial) : [];
  }

  /** Overlapping calls share the save already in flight. */
  save(store: ProfileSaver): Promise<SaveResult> {
    if (this.pendingSave) return this.pendingSave;
    const pending = this.runSave(this.require('save'), store);
    this.pendingSave = pending;
    void pending.finally(() => {
      if (this.pendingSave === pending) this.pendingSave = null;
    });
    return pending;
  }

  private async runSave(state: DraftState, store: ProfileSaver): Promise<SaveResult> {
    const submitted = copyProfile(state.current);
    try {
      const saved = await store.saveProfile(normalizeForSave(submitted));
      // Edits made while the save was in flight stay in the draft.
      if (this.state === state && isDirty(state.current, submitted)) {
        state.initial = copyProfile(saved);
      } else if (this.state === state) {
        this.commit(saved);
      }
      return { ok: true, profile: copyProfile(saved) };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  /** Loads another profile, saving a dirty draft first. A failed save leaves the draft in place. */
  async switchTo(record: ProfileRecord, store: ProfileSaver): Promise<SaveResult> {
    if (this.isDirty()) {
      const result = await this.save(store);
      if (!result.ok) return result;
    }
    this.load(record);
    return { ok: true, profile: copyProfile(record) };
  }

  private require(operation: string): DraftState {
    if (!this.state) throw new DraftNotLoadedError(operation);
    return this.state;
  }
}
