import { readFileSync } from 'fs';
import { z } from 'zod';
import { InputValidationError } from './errors.js';
import type { JobRequirement, MatchPreferences, ParsedResume } from './types.js';

const stringList = z.array(z.string()).default([]);
const nullableText = z.string().nullable().default(null);

const contactInfoSchema = z.object({
  name: z.string().default(''),
  email: z.string().default(''),
  phone: z.string().default(''),
  linkedin: nullableText,
  github: nullableText,
  portfolio: nullableText,
  location: nullableText,
});

export const resumeSchema: z.ZodType<ParsedResume, z.ZodTypeDef, unknown> = z.object({
  contactInfo: contactInfoSchema.default({}),
  summary: z.string().default(''),
  skills: z.record(z.string(), z.array(z.string())).default({}),
  workExperience: z
    .array(
      z.object({
        title: z.string(),
        company: z.string(),
        location: z.string().default(''),
        startDate: z.string().default(''),
        endDate: nullableText,
        durationMonths: z.number().nonnegative().default(0),
        responsibilities: stringList,
        achievements: stringList,
        skillsUsed: stringList,
      })
    )
    .default([]),
  education: z
    .array(
      z.object({
        degree: z.string(),
        field: z.string().default(''),
        institution: z.string().default(''),
        graduationYear: nullableText,
      })
    )
    .default([]),
  totalExperienceYears: z.number().nonnegative().default(0),
  seniorityLevel: z.string().default(''),
  primaryDomain: nullableText,
  skillConfidenceScores: z.record(z.string(), z.number().min(0).max(1)).default({}),
});

export const jobSchema: z.ZodType<JobRequirement, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  title: z.string(),
  company: z.string(),
  location: z.string().default(''),
  description: z.string().default(''),
  requiredSkills: stringList,
  preferredSkills: stringList,
  experienceLevel: z.string().default(''),
  educationRequired: nullableText,
  salaryRange: z.tuple([z.number(), z.number()]).nullable().default(null),
  jobType: z.string().default('full-time'),
  remoteFriendly: z.boolean().default(false),
  industry: nullableText,
  companySize: nullableText,
  benefits: stringList,
  applicationUrl: nullableText,
  sourcePlatform: z.string().default(''),
  postedDate: nullableText,
});

export const preferencesSchema: z.ZodType<Partial<MatchPreferences>, z.ZodTypeDef, unknown> = z.object({
  preferredLocations: z.array(z.string()).optional(),
  minSalary: z.number().nonnegative().optional(),
});

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputValidationError(filePath, message);
  }
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, source: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new InputValidationError(source, result.error.message);
  }
  return result.data;
}

export function loadResume(filePath: string): ParsedResume {
  return parseInput(resumeSchema, readJson(filePath), filePath);
}

/** Accepts either a JSON array of postings or `{ "jobs": [...] }`; ids must be unique. */
export function loadJobs(filePath: string): JobRequirement[] {
  const data = readJson(filePath);
  const wrapped = z.object({ jobs: z.array(z.unknown()) }).safeParse(data);
  const list = Array.isArray(data) ? data : wrapped.success ? wrapped.data.jobs : null;
  if (!list) {
    throw new InputValidationError(filePath, 'expected an array of jobs or an object with a "jobs" array');
  }
  const jobs = parseInput(z.array(jobSchema), list, filePath);

  const seen = new Set<string>();
  for (const job of jobs) {
    if (seen.has(job.id)) {
      throw new InputValidationError(filePath, `job id "${job.id}" appears more than once`);
    }
    seen.add(job.id);
  }
  return jobs;
}

export function loadPreferences(filePath: string): Partial<MatchPreferences> {
  return parseInput(preferencesSchema, readJson(filePath), filePath);
}
