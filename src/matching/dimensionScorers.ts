import type { MatchConfig } from '../config.js';
import type { JobRequirement, MatchPreferences, ParsedResume } from '../types.js';
import type { SimilarityScorer } from '../text/similarity.js';
import { normalizeCompany } from '../text/textNormalizer.js';

export interface ScoringContext {
  scorer: SimilarityScorer;
  config: MatchConfig;
}

export function candidateSkills(resume: ParsedResume): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const category of Object.values(resume.skills)) {
    for (const skill of category) {
      const key = skill.trim().toLowerCase();
      if (key && !seen.has(key)) {
        seen.add(key);
        skills.push(skill.trim());
      }
    }
  }
  return skills;
}

function containsEither(a: string, b: string): boolean {
  const left = a.toLowerCase().trim();
  const right = b.toLowerCase().trim();
  if (!left || !right) return false;
  return left.includes(right) || right.includes(left);
}

/**
 * Best score of one job skill against the candidate's skills. Keyword
 * containment (1 or 0) when no embedding backend is configured.
 */
export async function bestSkillMatch(jobSkill: string, skills: string[], ctx: ScoringContext): Promise<number> {
  if (!ctx.scorer.hasEmbeddings) {
    return skills.some(skill => containsEither(jobSkill, skill)) ? 1 : 0;
  }
  const { score } = await ctx.scorer.bestMatch(jobSkill, skills);
  return score;
}

async function averageBestMatch(jobSkills: string[], skills: string[], ctx: ScoringContext): Promise<number> {
  const scores = await Promise.all(jobSkills.map(jobSkill => bestSkillMatch(jobSkill, skills, ctx)));
  return scores.reduce((sum, s) => sum + s, 0) / scores.length;
}

export async function scoreSkills(resume: ParsedResume, job: JobRequirement, ctx: ScoringContext): Promise<number> {
  const skills = candidateSkills(resume);
  const required = job.requiredSkills.filter(s => s.trim());
  const preferred = job.preferredSkills.filter(s => s.trim());

  if (skills.length === 0 || (required.length === 0 && preferred.length === 0)) {
    return 0;
  }

  // An empty list hands its weight to the other one
  if (preferred.length === 0) return clamp(await averageBestMatch(required, skills, ctx));
  if (required.length === 0) return clamp(await averageBestMatch(preferred, skills, ctx));

  const [requiredScore, preferredScore] = await Promise.all([
    averageBestMatch(required, skills, ctx),
    averageBestMatch(preferred, skills, ctx),
  ]);

  return clamp(requiredScore * ctx.config.requiredSkillWeight + preferredScore * ctx.config.preferredSkillWeight);
}

export function resolveExperienceLevel(label: string, config: MatchConfig) {
  const key = label.toLowerCase().trim().replace(/\.$/, '');
  const canonical = config.experienceLevelAliases[key] ?? key;
  return config.experienceLevels[canonical] ?? null;
}

export function scoreExperience(resume: ParsedResume, job: JobRequirement, config: MatchConfig): number {
  const range = resolveExperienceLevel(job.experienceLevel, config);
  if (!range) return 0.5;

  const years = Math.max(0, resume.totalExperienceYears);
  if (years >= range.minYears && years <= range.maxYears) {
    return 1;
  }
  if (years > range.maxYears) {
    // Over-qualified: gentle decay, never below 0.7
    return Math.max(0.7, 1 - (years - range.maxYears) * 0.05);
  }
  return clamp((years / range.minYears) * 0.8);
}

function matchedEducationLevels(text: string, config: MatchConfig): number[] {
  return config.educationHierarchy.filter(({ pattern }) => pattern.test(text)).map(({ level }) => level);
}

/** Highest degree named in `text`, 0 when none is recognised. */
export function educationLevel(text: string, config: MatchConfig): number {
  return Math.max(0, ...matchedEducationLevels(text, config));
}

// "Bachelor's or Master's" is satisfied by the lower of the two
export function requiredEducationLevel(text: string, config: MatchConfig): number {
  const levels = matchedEducationLevels(text, config);
  return levels.length > 0 ? Math.min(...levels) : 0;
}

export function scoreEducation(resume: ParsedResume, job: JobRequirement, config: MatchConfig): number {
  const required = job.educationRequired?.trim() ?? '';
  if (!required || required.toLowerCase() === 'none') return 1;
  if (resume.education.length === 0) return 0.3;

  const requiredLevel = requiredEducationLevel(required, config);
  const candidateLevel = Math.max(...resume.education.map(edu => educationLevel(edu.degree, config)));

  if (candidateLevel >= requiredLevel) return 1;
  if (candidateLevel === requiredLevel - 1) return 0.8;
  return 0.5;
}

export function scoreLocation(resume: ParsedResume, job: JobRequirement, preferences: MatchPreferences): number {
  if (job.remoteFriendly) return 1;

  const jobLocation = job.location.trim();
  if (!jobLocation) return 0.3;

  if (preferences.preferredLocations.some(pref => containsEither(pref, jobLocation))) {
    return 0.9;
  }

  const home = resume.contactInfo.location;
  if (home && containsEither(home, jobLocation)) {
    return 0.8;
  }

  return 0.3;
}

export function hasLargeEmployerHistory(resume: ParsedResume, config: MatchConfig): boolean {
  const large = new Set(config.largeEmployers);
  return resume.workExperience.some(role => large.has(normalizeCompany(role.company)));
}

export function scoreCulture(resume: ParsedResume, job: JobRequirement, config: MatchConfig): number {
  let score = 0.5;

  const industry = job.industry?.toLowerCase().trim();
  if (resume.primaryDomain && industry) {
    const industries = config.domainIndustries[resume.primaryDomain] ?? [];
    if (industries.includes(industry)) {
      score += 0.3;
    }
  }

  const size = job.companySize?.toLowerCase().trim();
  if (resume.workExperience.length > 0 && size) {
    const largeHistory = hasLargeEmployerHistory(resume, config);
    if (largeHistory && size === 'large') {
      score += 0.2;
    } else if (!largeHistory && config.smallCompanySizes.includes(size)) {
      score += 0.2;
    }
  }

  return Math.min(score, 1);
}

export function scoreSalary(job: JobRequirement, preferences: MatchPreferences): number {
  if (!job.salaryRange) return 0.7;

  const [min, max] = job.salaryRange;
  if (max >= preferences.minSalary) return 1;
  if (min >= preferences.minSalary * 0.8) return 0.8;
  return 0.3;
}

export function clamp(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
