import { BLUR_MAX, BLUR_MIN } from './config';
import type { CardAesthetics, Color } from './types';

/** Per-field instruction for the optional aesthetics fields. */
export type FieldUpdate<T> =
  | { kind: 'keep' }
  | { kind: 'set'; value: T }
  | { kind: 'clear' };

export interface AestheticsUpdates {
  primaryColor?: Color;
  secondaryColor?: Color;
  borderColor?: Color;
  blurLevel?: number;
  backgroundColor?: FieldUpdate<Color>;
  backgroundImagePath?: FieldUpdate<string>;
}

/** Flag-style input as the editor controls emit it. */
export interface AestheticsFlagUpdates {
  primaryColor?: Color;
  secondaryColor?: Color;
  borderColor?: Color;
  blurLevel?: number;
  backgroundColor?: Color;
  clearBackgroundColor?: boolean;
  backgroundImagePath?: string;
  clearBackgroundImage?: boolean;
}

export const keep = <T>(): FieldUpdate<T> => ({ kind: 'keep' });
export const set = <T>(value: T): FieldUpdate<T> => ({ kind: 'set', value });
export const clear = <T>(): FieldUpdate<T> => ({ kind: 'clear' });

function applyOptional<T>(current: T | null, update: FieldUpdate<T> | undefined): T | null {
  if (!update) return current;
  switch (update.kind) {
    case 'keep':
      return current;
    case 'set':
      return update.value;
    case 'clear':
      return null;
  }
}

/**
 * Builds new card aesthetics from `existing` plus `updates`. A pure structural
 * merge: blur is not clamped here, see {@link clampBlurLevel}.
 */
export function mergeAesthetics(existing: CardAesthetics, updates: AestheticsUpdates): CardAesthetics {
  return {
    primaryColor: updates.primaryColor ?? existing.primaryColor,
    secondaryColor: updates.secondaryColor ?? existing.secondaryColor,
    borderColor: updates.borderColor ?? existing.borderColor,
    blurLevel: updates.blurLevel ?? existing.blurLevel,
    backgroundColor: applyOptional(existing.backgroundColor, updates.backgroundColor),
    backgroundImagePath: applyOptional(existing.backgroundImagePath, updates.backgroundImagePath),
  };
}

function optionalFromFlags<T>(field: string, value: T | undefined, clearFlag: boolean | undefined): FieldUpdate<T> {
  if (clearFlag) {
    if (value !== undefined) {
      console.warn(`Aesthetics update both sets and clears ${field}; clearing wins`);
    }
    return clear();
  }
  return value === undefined ? keep() : set(value);
}

/** Converts flag-style input into tagged updates. A clear flag beats a value for the same field. */
export function updatesFromFlags(flags: AestheticsFlagUpdates): AestheticsUpdates {
  const updates: AestheticsUpdates = {
    backgroundColor: optionalFromFlags('backgroundColor', flags.backgroundColor, flags.clearBackgroundColor),
    backgroundImagePath: optionalFromFlags('backgroundImagePath', flags.backgroundImagePath, flags.clearBackgroundImage),
  };
  if (flags.primaryColor !== undefined) updates.primaryColor = flags.primaryColor;
  if (flags.secondaryColor !== undefined) updates.secondaryColor = flags.secondaryColor;
  if (flags.borderColor !== undefined) updates.borderColor = flags.borderColor;
  if (flags.blurLevel !== undefined) updates.blurLevel = flags.blurLevel;
  return updates;
}

export function clampBlurLevel(value: number): number {
  if (Number.isNaN(value)) return BLUR_MIN;
  return Math.min(BLUR_MAX, Math.max(BLUR_MIN, value));
}
