import { z } from 'zod';
import { VALUE_SETS, type ValueSetName } from '../domain/value-sets';

// Field schemas for manage_records. Record fields travel as a loose object
// parameter and are parsed here per entity. Enumerated fields stay plain
// strings; the repos check membership and report DOMAIN_VIOLATION.

const text = z.string().trim().min(1);
const optionalText = z.string().nullable().optional();
const textSet = z.array(z.string()).optional();

function member(domain: ValueSetName) {
  return z.string().describe(`One of: ${VALUE_SETS[domain].join(', ')}`);
}

function members(domain: ValueSetName) {
  return z.array(z.string()).describe(`Any of: ${VALUE_SETS[domain].join(', ')}`);
}

export const cycleFieldsSchema = z.object({
  name: text,
  description: optionalText,
  archived: z.boolean().optional(),
});

export const volunteerFieldsSchema = z.object({
  firstName: text,
  lastName: text,
  email: text,
  phone: optionalText,
  gender: member('gender').optional(),
  ethnicity: members('ethnicity').optional(),
  ageRange: member('ageRange').optional(),
  university: textSet,
  lgbt: member('lgbtStatus').optional(),
  country: text,
  usState: optionalText,
  fli: members('fliStatus').optional(),
  studentStage: member('studentStage').optional(),
  majors: textSet,
  minors: textSet,
  hearAbout: members('hearAbout').optional(),
});

export const mentorFieldsSchema = z.object({
  firstName: text,
  lastName: text,
  email: text,
  phone: optionalText,
  company: text,
  jobTitle: text,
  country: text,
  usState: optionalText,
  yearsExperience: member('mentorYearsExperience'),
  experienceLevel: member('mentorExperienceLevel'),
  priorMentor: z.boolean().optional(),
  priorMentee: z.boolean().optional(),
  priorStudent: z.boolean().optional(),
  university: textSet,
  hearAbout: members('hearAbout').optional(),
});

export const clientFieldsSchema = z.object({
  representativeFirstName: text,
  representativeLastName: text,
  representativeJobTitle: optionalText,
  email: text,
  emailCc: optionalText,
  phone: text,
  orgName: text,
  projectName: text,
  orgWebsite: optionalText,
  countryHq: optionalText,
  usStateHq: optionalText,
  address: text,
  size: member('clientSize'),
  impactCauses: members('impactCause').optional(),
});

export const teamRoleFieldsSchema = z.object({
  name: text,
  description: z.string().default(''),
});
