/** CSS hex colour, lower-case: `#rrggbb` or `#rrggbbaa`. */
export type Color = string;

export type ProfileType = 'personal' | 'professional' | 'custom';

export interface CardAesthetics {
  primaryColor: Color;
  secondaryColor: Color;
  borderColor: Color;
  /** `null` means no solid background. */
  backgroundColor: Color | null;
  blurLevel: number;
  backgroundImagePath: string | null;
}

export interface CustomLink {
  title: string;
  url: string;
}

export interface ProfileRecord {
  id: string;
  type: ProfileType;
  name: string;
  title: string | null;
  company: string | null;
  phone: string | null;
  email: string | null;
  website: string | null;
  socialMedia: Record<string, string>;
  customLinks: CustomLink[];
  profileImagePath: string | null;
  cardAesthetics: CardAesthetics;
  lastUpdated: string;
  isActive: boolean;
  sharePayload: string | null;
}

export interface ColorCombination {
  primary?: Color | null;
  secondary?: Color | null;
  background?: Color | null;
  border?: Color | null;
}

export interface ValidationResult {
  isValid: boolean;
  missingFields: string[];
  warnings: string[];
  canShare: boolean;
}

export type SaveResult =
  | { ok: true; profile: ProfileRecord }
  | { ok: false; error: Error };
