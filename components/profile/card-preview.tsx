'use client';

import type { CSSProperties } from 'react';
import type { ProfileRecord } from '@/lib/types';

interface CardPreviewProps {
  profile: ProfileRecord;
}

export default function CardPreview({ profile }: CardPreviewProps) {
  const aesthetics = profile.cardAesthetics;

  const cardStyle: CSSProperties = {
    background: aesthetics.backgroundColor
      ?? `linear-gradient(135deg, ${aesthetics.primaryColor}, ${aesthetics.secondaryColor})`,
    borderColor: aesthetics.borderColor,
    backdropFilter: `blur(${aesthetics.blurLevel}px)`,
  };
  if (aesthetics.backgroundImagePath) {
    cardStyle.backgroundImage = `url(${aesthetics.backgroundImagePath})`;
    cardStyle.backgroundSize = 'cover';
  }

  const contactLines = [profile.phone, profile.email, profile.website].filter(
    (line): line is string => !!line && line.trim() !== ''
  );
  const socials = Object.entries(profile.socialMedia).filter(([, handle]) => handle.trim() !== '');

  return (
    <div
      style={cardStyle}
      className="aspect-[1.6/1] w-full max-w-md rounded-2xl border-2 p-6 text-white shadow-lg overflow-hidden"
    >
      <div className="flex items-center gap-4">
        <div className="w-16 h-16 rounded-full bg-white/20 flex items-center justify-center overflow-hidden">
          {profile.profileImagePath ? (
            <img src={profile.profileImagePath} alt="Profile" className="w-full h-full object-cover" />
          ) : (
            <span className="text-2xl font-semibold">{profile.name.trim().charAt(0) || '?'}</span>
          )}
        </div>
        <div>
          <h2 className="text-2xl font-bold">{profile.name || 'Your name'}</h2>
          {(profile.title || profile.company) && (
            <p className="text-sm text-white/80">
              {[profile.title, profile.company].filter(Boolean).join(' · ')}
            </p>
          )}
        </div>
      </div>

      <div className="mt-6 space-y-1 text-sm">
        {contactLines.map(line => (
          <p key={line}>{line}</p>
        ))}
      </div>

      {(socials.length > 0 || profile.customLinks.length > 0) && (
        <div className="mt-4 flex flex-wrap gap-2">
          {socials.map(([platform, handle]) => (
            <span key={platform} className="px-3 py-1 bg-white/20 rounded-full text-xs">
              {platform}: {handle}
            </span>
          ))}
          {profile.customLinks.map((link, index) => (
            <a
              key={index}
              href={link.url}
              target="_blank"
              rel="noopener noreferrer"
              className="px-3 py-1 bg-white/20 hover:bg-white/30 rounded-full text-xs transition-colors"
            >
              {link.title || link.url}
            </a>
          ))}
        </div>
      )}
    </div>
  );
}
