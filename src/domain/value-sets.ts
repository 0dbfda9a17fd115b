/**
 * Closed value sets for enumerated record fields.
 *
 * The arrays are the persisted strings. Repos validate against them before
 * writing; the SQL schema repeats them as CHECK constraints.
 */

import { DomainViolationError } from './types';

// ============================================================================
// Sets
// ============================================================================

export const GENDERS = ['woman', 'man', 'non_binary', 'other', 'prefer_not_to_say'] as const;

export const ETHNICITIES = [
  'asian',
  'white_or_caucasian',
  'black_or_african_american',
  'american_indian_or_alaska_native',
  'native_hawaiian_or_pacific_islander',
  'latino_or_hispanic',
  'other',
  'prefer_not_to_say',
] as const;

export const AGE_RANGES = [
  '18-24',
  '25-29',
  '30-34',
  '35-39',
  '40-44',
  '45-59',
  '60-64',
  '65+',
  'prefer_not_to_say',
] as const;

export const CLIENT_SIZES = ['0', '1-5', '6-20', '21-50', '51-100', '101-500', '500+'] as const;

export const LGBT_STATUSES = ['yes', 'no', 'ally', 'prefer_not_to_say'] as const;

export const FLI_STATUSES = ['first_generation', 'low_income', 'neither', 'prefer_not_to_say'] as const;

export const STUDENT_STAGES = [
  'freshman',
  'sophomore',
  'junior',
  'senior',
  'masters_student',
  'phd_student',
  'recent_graduate',
] as const;

export const MENTOR_YEARS_EXPERIENCE = ['2-5', '6-10', '11-15', '16-20', '21+'] as const;

export const MENTOR_EXPERIENCE_LEVELS = [
  'intermediate',
  'first_level_management',
  'middle_management',
  'senior_or_executive',
] as const;

export const HEAR_ABOUT_SOURCES = [
  'linkedin',
  'university',
  'company_social_impact_team',
  'colleague',
  'program_member',
  'nonprofit',
  'online_ad',
  'instagram',
  'word_of_mouth',
  'bootcamp',
  'discord_or_slack',
  'unknown',
  'other',
] as const;

export const IMPACT_CAUSES = [
  'animals',
  'career_and_professional_development',
  'disaster_relief',
  'education',
  'environment_and_sustainability',
  'faith_and_religion',
  'health_and_medicine',
  'global_relations',
  'poverty_and_hunger',
  'senior_services',
  'justice_and_equity',
  'veterans_and_military_families',
  'other',
] as const;

export const JOB_STATUSES = ['pending', 'complete', 'cancelled', 'error'] as const;

export type Gender = (typeof GENDERS)[number];
export type Ethnicity = (typeof ETHNICITIES)[number];
export type AgeRange = (typeof AGE_RANGES)[number];
export type ClientSize = (typeof CLIENT_SIZES)[number];
export type LgbtStatus = (typeof LGBT_STATUSES)[number];
export type FliStatus = (typeof FLI_STATUSES)[number];
export type StudentStage = (typeof STUDENT_STAGES)[number];
export type MentorYearsExperience = (typeof MENTOR_YEARS_EXPERIENCE)[number];
export type MentorExperienceLevel = (typeof MENTOR_EXPERIENCE_LEVELS)[number];
export type HearAboutSource = (typeof HEAR_ABOUT_SOURCES)[number];
export type ImpactCause = (typeof IMPACT_CAUSES)[number];
export type JobStatus = (typeof JOB_STATUSES)[number];

export const VALUE_SETS = {
  gender: GENDERS,
  ethnicity: ETHNICITIES,
  ageRange: AGE_RANGES,
  clientSize: CLIENT_SIZES,
  lgbtStatus: LGBT_STATUSES,
  fliStatus: FLI_STATUSES,
  studentStage: STUDENT_STAGES,
  mentorYearsExperience: MENTOR_YEARS_EXPERIENCE,
  mentorExperienceLevel: MENTOR_EXPERIENCE_LEVELS,
  hearAbout: HEAR_ABOUT_SOURCES,
  impactCause: IMPACT_CAUSES,
  jobStatus: JOB_STATUSES,
} as const;

export type ValueSetName = keyof typeof VALUE_SETS;
export type ValueOf<N extends ValueSetName> = (typeof VALUE_SETS)[N][number];

// ============================================================================
// Validation
// ============================================================================

export function isInDomain<N extends ValueSetName>(domain: N, value: unknown): value is ValueOf<N> {
  const members: readonly string[] = VALUE_SETS[domain];
  return typeof value === 'string' && members.includes(value);
}

export function assertInDomain<N extends ValueSetName>(field: string, domain: N, value: unknown): ValueOf<N> {
  if (!isInDomain(domain, value)) {
    throw new DomainViolationError(field, domain, String(value));
  }
  return value;
}

/**
 * Validates every member of a set-valued field and drops repeats,
 * keeping first-seen order.
 */
export function assertAllInDomain<N extends ValueSetName>(
  field: string,
  domain: N,
  values: readonly unknown[]
): ValueOf<N>[] {
  const accepted: ValueOf<N>[] = [];
  for (const value of values) {
    const member = assertInDomain(field, domain, value);
    if (!accepted.includes(member)) {
      accepted.push(member);
    }
  }
  return accepted;
}
