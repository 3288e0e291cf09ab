'use client';

import Link from 'next/link';
import AestheticsPanel from '@/components/profile/aesthetics-panel';
import CardPreview from '@/components/profile/card-preview';
import TextField from '@/components/profile/text-field';
import { useProfileEditor, type TextField as TextFieldName } from '@/hooks/use-profile-editor';
import { MAX_CUSTOM_LINKS } from '@/lib/config';
import { AVAILABLE_SOCIALS, PROFILE_TYPES, PROFILE_TYPE_LABELS } from '@/lib/profile-defaults';
import { isFieldRequired } from '@/lib/validation';

const TEXT_FIELDS: { field: TextFieldName; label: string; type?: 'text' | 'email' | 'tel' | 'url' }[] = [
  { field: 'name', label: 'Name' },
  { field: 'title', label: 'Title' },
  { field: 'company', label: 'Company' },
  { field: 'phone', label: 'Phone', type: 'tel' },
  { field: 'email', label: 'Email', type: 'email' },
  { field: 'website', label: 'Website', type: 'url' },
];

export default function EditProfilePage() {
  const editor = useProfileEditor();
  const { profile } = editor;

  if (editor.isLoading) {
    return (
      <div className="min-h-screen flex items-center justify-center bg-gradient-to-br from-white via-blue-50/30 to-orange-50/40">
        <div className="text-center space-y-4">
          <div className="animate-spin w-12 h-12 border-4 border-brand border-t-transparent rounded-full mx-auto" />
          <p className="text-lg text-gray-600 font-medium">Loading profile...</p>
        </div>
      </div>
    );
  }

  if (!profile) {
    return (
      <div className="min-h-screen flex items-center justify-center bg-gradient-to-br from-white via-blue-50/30 to-orange-50/40">
        <div className="text-center space-y-6 max-w-md">
          <h1 className="text-2xl font-semibold text-gray-900">Create your first card</h1>
          {editor.error && <p className="text-sm text-red-600">{editor.error}</p>}
          <div className="flex flex-col gap-3">
            {PROFILE_TYPES.map(type => (
              <button
                key={type}
                onClick={() => void editor.createProfile(type)}
                className="px-6 py-4 bg-white rounded-2xl border-2 border-gray-200 hover:border-brand-light text-left transition-all"
              >
                <p className="font-medium text-gray-900">{PROFILE_TYPE_LABELS[type].label}</p>
                <p className="text-sm text-gray-500">{PROFILE_TYPE_LABELS[type].description}</p>
              </button>
            ))}
          </div>
        </div>
      </div>
    );
  }

  const canSave = editor.isDirty && !editor.isSaving;

  return (
    <div className="min-h-screen bg-gray-50 py-8 px-4">
      <div className="max-w-5xl mx-auto space-y-6">
        <div className="flex items-center justify-between">
          <Link href="/" className="text-sm text-gray-500 hover:text-gray-700">← Back</Link>
          {editor.profiles.length > 1 && (
            <select
              value={profile.id}
              onChange={(e) => void editor.switchProfile(e.target.value)}
              className="px-3 py-2 rounded-xl border-2 border-gray-200 bg-white text-sm"
            >
              {editor.profiles.map(p => (
                <option key={p.id} value={p.id}>
                  {PROFILE_TYPE_LABELS[p.type].label}{p.name ? ` · ${p.name}` : ''}
                </option>
              ))}
            </select>
          )}
        </div>

        <div className="grid gap-8 lg:grid-cols-2">
          <div className="space-y-6">
            <CardPreview profile={profile} />
            <AestheticsPanel
              aesthetics={profile.cardAesthetics}
              recentCombinations={editor.recentCombinations}
              onChange={editor.mergeAesthetics}
              onApplyCombination={editor.applyCombination}
            />
          </div>

          <div className="space-y-4">
            {TEXT_FIELDS.map(({ field, label, type }) => (
              <TextField
                key={field}
                label={label}
                type={type}
                value={profile[field]}
                required={isFieldRequired(profile, field)}
                onChange={(value) => editor.updateField(field, value)}
              />
            ))}

            <TextField
              label="Photo URL"
              type="url"
              value={profile.profileImagePath}
              placeholder="https://..."
              onChange={(value) => editor.setProfileImage(value === '' ? null : value)}
            />

            <div className="pt-4 border-t border-gray-200 space-y-4">
              <p className="text-xs text-gray-500 uppercase tracking-wide">Social</p>
              {AVAILABLE_SOCIALS[profile.type].map(platform => (
                <TextField
                  key={platform}
                  label={platform}
                  value={profile.socialMedia[platform] ?? ''}
                  onChange={(value) => editor.updateSocial(platform, value)}
                />
              ))}
            </div>

            <div className="pt-4 border-t border-gray-200 space-y-4">
              <p className="text-xs text-gray-500 uppercase tracking-wide">Links</p>
              {profile.customLinks.map((link, index) => (
                <div key={index} className="grid grid-cols-[1fr_2fr_auto] gap-2 items-end">
                  <TextField
                    label="Title"
                    value={link.title}
                    onChange={(title) => editor.updateCustomLink(index, { ...link, title })}
                  />
                  <TextField
                    label="URL"
                    type="url"
                    value={link.url}
                    onChange={(url) => editor.updateCustomLink(index, { ...link, url })}
                  />
                  <button
                    onClick={() => editor.removeCustomLink(index)}
                    className="px-3 py-3 text-sm text-gray-500 hover:text-red-600"
                    aria-label={`Remove link ${index + 1}`}
                  >
                    ✕
                  </button>
                </div>
              ))}
              {profile.customLinks.length < MAX_CUSTOM_LINKS && (
                <button
                  onClick={editor.addCustomLink}
                  className="text-sm text-brand hover:text-brand-light"
                >
                  + Add link
                </button>
              )}
            </div>

            {editor.validation && editor.validation.warnings.length > 0 && (
              <ul className="text-sm text-amber-700 space-y-1">
                {editor.validation.warnings.map(warning => <li key={warning}>{warning}</li>)}
              </ul>
            )}
            {editor.error && (
              <p className="text-sm text-red-600">{editor.error} Try saving again.</p>
            )}

            {editor.isDirty && (
              <div className="flex items-center justify-between text-sm text-gray-500">
                <span>
                  {editor.changedFields.length} unsaved {editor.changedFields.length === 1 ? 'change' : 'changes'}
                </span>
                <button
                  onClick={() => void editor.reload()}
                  disabled={editor.isSaving}
                  className="hover:text-gray-700"
                >
                  Discard changes
                </button>
              </div>
            )}

            <button
              onClick={() => void editor.save()}
              disabled={!canSave}
              className={`w-full px-8 py-4 rounded-full text-lg font-medium transition-colors shadow-lg ${
                canSave
                  ? 'bg-brand text-white hover:bg-brand-light'
                  : 'bg-gray-200 text-gray-500 cursor-not-allowed'
              }`}
            >
              {editor.isSaving ? 'Saving...' : editor.isDirty ? 'Save changes' : 'Saved'}
            </button>
          </div>
        </div>
      </div>
    </div>
  );
}
