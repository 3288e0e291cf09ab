import { z } from 'zod';
import { MAX_CUSTOM_LINKS } from './config';

export const colorSchema = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, 'Expected a #rrggbb or #rrggbbaa colour')
  .transform(value => value.toLowerCase());

export const profileTypeSchema = z.enum(['personal', 'professional', 'custom']);

export const cardAestheticsSchema = z.object({
  primaryColor: colorSchema,
  secondaryColor: colorSchema,
  borderColor: colorSchema,
  backgroundColor: colorSchema.nullable(),
  blurLevel: z.number().finite(),
  backgroundImagePath: z.string().nullable(),
});

export const customLinkSchema = z.object({
  title: z.string(),
  url: z.string(),
});

export const profileRecordSchema = z.object({
  id: z.string().min(1),
  type: profileTypeSchema,
  name: z.string(),
  title: z.string().nullable(),
  company: z.string().nullable(),
  phone: z.string().nullable(),
  email: z.string().nullable(),
  website: z.string().nullable(),
  socialMedia: z.record(z.string()),
  customLinks: z.array(customLinkSchema).max(MAX_CUSTOM_LINKS),
  profileImagePath: z.string().nullable(),
  cardAesthetics: cardAestheticsSchema,
  lastUpdated: z.string().datetime(),
  isActive: z.boolean(),
  sharePayload: z.string().nullable(),
});

export const activateProfileSchema = z.object({
  id: z.string().min(1),
});
