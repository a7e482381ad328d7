/**
 * Categorical Values
 *
 * Canonical codes for the enum-backed survey columns and the normalization
 * that maps raw CSV text onto them.
 */

import { InvalidCategoryValueError } from '../errors.js';

export const GENDERS = ['MALE', 'FEMALE'] as const;
export type Gender = (typeof GENDERS)[number];

export const ACADEMIC_LEVELS = ['UNDERGRADUATE', 'GRADUATE', 'HIGH_SCHOOL'] as const;
export type AcademicLevel = (typeof ACADEMIC_LEVELS)[number];

export const PLATFORMS = [
  'INSTAGRAM',
  'TWITTER',
  'TIK_TOK',
  'YOUTUBE',
  'FACEBOOK',
  'LINKEDIN',
  'SNAPCHAT',
  'LINE',
  'KAKAOTALK',
  'VKONTAKTE',
  'WHATSAPP',
  'WECHAT',
] as const;
export type Platform = (typeof PLATFORMS)[number];

export const RELATIONSHIP_STATUSES = ['SINGLE', 'IN_RELATIONSHIP', 'COMPLICATED'] as const;
export type RelationshipStatus = (typeof RELATIONSHIP_STATUSES)[number];

/**
 * Uppercases, trims and joins words with underscores:
 * `" High School "` → `"HIGH_SCHOOL"`.
 */
export function toCode(raw: string): string {
  return raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

const compact = (code: string): string => code.replace(/_/g, '');

/**
 * Resolves `raw` to a member of `members`. A value whose letters match a
 * member once underscores are dropped also resolves (`TikTok` → `TIK_TOK`).
 */
export function toCategory<T extends string>(
  members: readonly T[],
  raw: string,
  dimension: string
): T {
  const code = toCode(raw);
  const match =
    members.find((member) => member === code) ??
    members.find((member) => compact(member) === compact(code));

  if (match === undefined) {
    throw new InvalidCategoryValueError(dimension, raw);
  }
  return match;
}

export const toGender = (raw: string): Gender => toCategory(GENDERS, raw, 'gender');

export const toAcademicLevel = (raw: string): AcademicLevel =>
  toCategory(ACADEMIC_LEVELS, raw, 'academic level');

export const toPlatform = (raw: string): Platform => toCategory(PLATFORMS, raw, 'platform');

export const toRelationshipStatus = (raw: string): RelationshipStatus =>
  toCategory(RELATIONSHIP_STATUSES, raw, 'relationship status');
