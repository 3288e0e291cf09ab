'use client';

import { clampBlurLevel, clear, set, type AestheticsUpdates } from '@/lib/aesthetics';
import { BLUR_MAX, BLUR_MIN } from '@/lib/config';
import type { CardAesthetics, ColorCombination } from '@/lib/types';

interface AestheticsPanelProps {
  aesthetics: CardAesthetics;
  recentCombinations: ColorCombination[];
  onChange: (updates: AestheticsUpdates) => void;
  onApplyCombination: (combination: ColorCombination) => void;
}

// <input type="color"> only takes #rrggbb
const toPickerValue = (color: string) => color.slice(0, 7);

function Swatch({ color }: { color: string | null | undefined }) {
  return (
    <span
      className="w-5 h-5 rounded-full border border-gray-300 inline-block"
      style={{ background: color ?? 'transparent' }}
    />
  );
}

export default function AestheticsPanel({
  aesthetics,
  recentCombinations,
  onChange,
  onApplyCombination,
}: AestheticsPanelProps) {
  const colorInputs: { key: 'primaryColor' | 'secondaryColor' | 'borderColor'; label: string }[] = [
    { key: 'primaryColor', label: 'Primary' },
    { key: 'secondaryColor', label: 'Secondary' },
    { key: 'borderColor', label: 'Border' },
  ];

  return (
    <div className="space-y-6">
      <div className="grid grid-cols-2 gap-4">
        {colorInputs.map(({ key, label }) => (
          <label key={key} className="flex items-center justify-between gap-2 text-sm text-gray-600">
            {label}
            <input
              type="color"
              value={toPickerValue(aesthetics[key])}
              onChange={(e) => {
                const updates: AestheticsUpdates = {};
                updates[key] = e.target.value.toLowerCase();
                onChange(updates);
              }}
            />
          </label>
        ))}
        <div className="flex items-center justify-between gap-2 text-sm text-gray-600">
          Background
          <div className="flex items-center gap-2">
            <input
              type="color"
              value={toPickerValue(aesthetics.backgroundColor ?? '#000000')}
              onChange={(e) => onChange({ backgroundColor: set(e.target.value.toLowerCase()) })}
            />
            {aesthetics.backgroundColor && (
              <button
                onClick={() => onChange({ backgroundColor: clear() })}
                className="text-xs text-gray-500 hover:text-gray-700 underline"
              >
                None
              </button>
            )}
          </div>
        </div>
      </div>

      <label className="block space-y-2 text-sm text-gray-600">
        <span>Glassmorphic Blur: {aesthetics.blurLevel.toFixed(1)}px</span>
        <input
          type="range"
          min={BLUR_MIN}
          max={BLUR_MAX}
          step={0.5}
          value={aesthetics.blurLevel}
          onChange={(e) => onChange({ blurLevel: clampBlurLevel(Number(e.target.value)) })}
          className="w-full"
        />
      </label>

      {aesthetics.backgroundImagePath && (
        <button
          onClick={() => onChange({ backgroundImagePath: clear() })}
          className="text-sm text-gray-500 hover:text-gray-700 underline"
        >
          Remove background image
        </button>
      )}

      {recentCombinations.length > 0 && (
        <div className="pt-4 border-t border-gray-100">
          <p className="text-xs text-gray-500 uppercase tracking-wide mb-2">Recent</p>
          <div className="flex gap-3">
            {recentCombinations.map((combination, index) => (
              <button
                key={index}
                onClick={() => onApplyCombination(combination)}
                className="flex gap-1 px-2 py-1 rounded-full border border-gray-200 hover:shadow-md transition-all"
                aria-label={`Apply recent combination ${index + 1}`}
              >
                <Swatch color={combination.primary} />
                <Swatch color={combination.secondary} />
                <Swatch color={combination.background} />
                <Swatch color={combination.border} />
              </button>
            ))}
          </div>
        </div>
      )}
    </div>
  );
}
