'use client';

import { useState, useCallback, useRef, useEffect, useMemo } from 'react';
import { clear, mergeAesthetics as mergeCardAesthetics, set, type AestheticsUpdates } from '@/lib/aesthetics';
import { MAX_CUSTOM_LINKS } from '@/lib/config';
import type { ProfileStore } from '@/lib/db';
import { errorMessage } from '@/lib/errors';
import { createProfileClient } from '@/lib/profile-client';
import { createEmptyProfile } from '@/lib/profile-defaults';
import { ProfileDraft } from '@/lib/profile-draft';
import {
  RecentCombinations,
  combinationFromAesthetics,
  shouldRemember,
} from '@/lib/recent-combinations';
import type {
  CardAesthetics,
  ColorCombination,
  CustomLink,
  ProfileRecord,
  ProfileType,
  ValidationResult,
} from '@/lib/types';
import { validateProfile } from '@/lib/validation';

export type TextField = 'name' | 'title' | 'company' | 'phone' | 'email' | 'website';

export interface UseProfileEditorOptions {
  store?: ProfileStore;
  onSaved?: (profile: ProfileRecord) => void;
}

export interface UseProfileEditorReturn {
  profile: ProfileRecord | null;
  profiles: ProfileRecord[];
  isLoading: boolean;
  isSaving: boolean;
  isDirty: boolean;
  changedFields: string[];
  validation: ValidationResult | null;
  error: string | null;
  recentCombinations: ColorCombination[];
  updateField: (field: TextField, value: string) => void;
  updateSocial: (platform: string, value: string) => void;
  updateCustomLink: (index: number, link: CustomLink) => void;
  addCustomLink: () => void;
  removeCustomLink: (index: number) => void;
  setProfileImage: (path: string | null) => void;
  mergeAesthetics: (updates: AestheticsUpdates) => CardAesthetics | null;
  applyCombination: (combination: ColorCombination) => void;
  save: () => Promise<boolean>;
  reload: () => Promise<void>;
  createProfile: (type: ProfileType) => Promise<boolean>;
  switchProfile: (id: string) => Promise<boolean>;
}

export function useProfileEditor(options: UseProfileEditorOptions = {}): UseProfileEditorReturn {
  const { onSaved } = options;
  const store = useMemo(() => options.store ?? createProfileClient(), [options.store]);

  const draftRef = useRef(new ProfileDraft());
  const recentRef = useRef(new RecentCombinations());
  // Set synchronously so a second click before re-render cannot start another save
  const savingRef = useRef(false);

  const [profile, setProfile] = useState<ProfileRecord | null>(null);
  const [profiles, setProfiles] = useState<ProfileRecord[]>([]);
  const [isLoading, setIsLoading] = useState(true);
  const [isSaving, setIsSaving] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [recentCombinations, setRecentCombinations] = useState<ColorCombination[]>([]);

  const draft = draftRef.current;

  const edit = useCallback((updater: (current: ProfileRecord) => ProfileRecord): ProfileRecord | null => {
    if (!draftRef.current.isLoaded) return null;
    const next = draftRef.current.mutate(updater);
    setProfile(next);
    return next;
  }, []);

  const reload = useCallback(async () => {
    setIsLoading(true);
    try {
      const [active, all] = await Promise.all([store.loadActiveProfile(), store.listProfiles()]);
      setProfiles(all);
      if (active) {
        draftRef.current.load(active);
        setProfile(draftRef.current.current);
      }
      setError(null);
    } catch (err) {
      console.error('Failed to load profile:', err);
      setError(errorMessage(err));
    } finally {
      setIsLoading(false);
    }
  }, [store]);

  useEffect(() => {
    void reload();
  }, [reload]);

  const updateField = useCallback((field: TextField, value: string) => {
    edit(current => {
      const next = { ...current };
      next[field] = value;
      return next;
    });
  }, [edit]);

  const updateSocial = useCallback((platform: string, value: string) => {
    edit(current => ({ ...current, socialMedia: { ...current.socialMedia, [platform]: value } }));
  }, [edit]);

  const updateCustomLink = useCallback((index: number, link: CustomLink) => {
    edit(current => ({
      ...current,
      customLinks: current.customLinks.map((existing, i) => (i === index ? { ...link } : existing)),
    }));
  }, [edit]);

  const addCustomLink = useCallback(() => {
    edit(current => current.customLinks.length >= MAX_CUSTOM_LINKS
      ? current
      : { ...current, customLinks: [...current.customLinks, { title: '', url: '' }] });
  }, [edit]);

  const removeCustomLink = useCallback((index: number) => {
    edit(current => ({ ...current, customLinks: current.customLinks.filter((_, i) => i !== index) }));
  }, [edit]);

  const setProfileImage = useCallback((path: string | null) => {
    edit(current => ({ ...current, profileImagePath: path }));
  }, [edit]);

  const mergeAesthetics = useCallback((updates: AestheticsUpdates) => {
    const next = edit(current => ({
      ...current,
      cardAesthetics: mergeCardAesthetics(current.cardAesthetics, updates),
    }));
    return next ? next.cardAesthetics : null;
  }, [edit]);

  const applyCombination = useCallback((combination: ColorCombination) => {
    const updates: AestheticsUpdates = {};
    if (combination.primary) updates.primaryColor = combination.primary;
    if (combination.secondary) updates.secondaryColor = combination.secondary;
    if (combination.border) updates.borderColor = combination.border;
    updates.backgroundColor = combination.background ? set(combination.background) : clear();
    mergeAesthetics(updates);
  }, [mergeAesthetics]);

  const save = useCallback(async () => {
    if (savingRef.current || !draftRef.current.isLoaded) return false;

    savingRef.current = true;
    setIsSaving(true);
    const result = await draftRef.current.save(store);
    savingRef.current = false;
    setIsSaving(false);

    if (!result.ok) {
      console.error('Failed to save profile:', result.error);
      setError(result.error.message);
      return false;
    }

    setError(null);
    setProfile(draftRef.current.current);
    setProfiles(prev => prev.map(p => (p.id === result.profile.id ? result.profile : p)));
    const aesthetics = result.profile.cardAesthetics;
    if (shouldRemember(aesthetics)) {
      recentRef.current.add(combinationFromAesthetics(aesthetics));
      setRecentCombinations(recentRef.current.list());
    }
    onSaved?.(result.profile);
    return true;
  }, [store, onSaved]);

  const createProfile = useCallback(async (type: ProfileType) => {
    try {
      const created = await store.saveProfile(createEmptyProfile(type));
      await store.setActiveProfile(created.id);
      await reload();
      return true;
    } catch (err) {
      console.error('Failed to create profile:', err);
      setError(errorMessage(err));
      return false;
    }
  }, [store, reload]);

  const switchProfile = useCallback(async (id: string) => {
    const target = profiles.find(p => p.id === id);
    if (!target) return false;

    const result = await draftRef.current.switchTo(target, store);
    if (!result.ok) {
      console.error('Failed to save profile before switching:', result.error);
      setError(result.error.message);
      return false;
    }

    try {
      const active = await store.setActiveProfile(id);
      draftRef.current.load(active);
      setProfile(draftRef.current.current);
      setProfiles(await store.listProfiles());
      setError(null);
      return true;
    } catch (err) {
      console.error('Failed to switch profile:', err);
      setError(errorMessage(err));
      return false;
    }
  }, [profiles, store]);

  // `profile` changes on every edit, so these recompute with it
  const isDirty = profile ? draft.isDirty() : false;
  const changedFields = profile ? draft.changedFields() : [];
  const validation = useMemo(() => (profile ? validateProfile(profile) : null), [profile]);

  return {
    profile,
    profiles,
    isLoading,
    isSaving,
    isDirty,
    changedFields,
    validation,
    error,
    recentCombinations,
    updateField,
    updateSocial,
    updateCustomLink,
    addCustomLink,
    removeCustomLink,
    setProfileImage,
    mergeAesthetics,
    applyCombination,
    save,
    reload,
    createProfile,
    switchProfile,
  };
}
