import { matchConfig, type MatchConfig, type MatchWeights, type RecommendationThresholds } from '../config.js';
import { InvalidWeightsError } from '../errors.js';
import type { SimilarityScorer } from '../text/similarity.js';
import type {
  ConfidenceLevel,
  DimensionName,
  DimensionScores,
  JobRequirement,
  MatchAnalysis,
  MatchPreferences,
  MatchResult,
  ParsedResume,
  RecommendationLabel,
} from '../types.js';
import {
  bestSkillMatch,
  candidateSkills,
  clamp,
  resolveExperienceLevel,
  scoreCulture,
  scoreEducation,
  scoreExperience,
  scoreLocation,
  scoreSalary,
  scoreSkills,
  type ScoringContext,
} from './dimensionScorers.js';

export interface CompositeMatcherOptions {
  scorer: SimilarityScorer;
  weights?: MatchWeights;
  thresholds?: RecommendationThresholds;
  skillThreshold?: number;
  config?: MatchConfig;
}

const DIMENSIONS: DimensionName[] = ['skills', 'experience', 'education', 'location', 'culture', 'salary'];

const WEIGHT_TOLERANCE = 1e-6;

export function validateWeights(weights: MatchWeights): void {
  for (const dimension of DIMENSIONS) {
    const weight = weights[dimension];
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new InvalidWeightsError(weights, `weight for ${dimension} must be within [0, 1], got ${weight}`);
    }
  }
  const sum = DIMENSIONS.reduce((acc, dimension) => acc + weights[dimension], 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidWeightsError(weights, 'weights must sum to 1.0');
  }
}

const RECOMMENDATION_DETAILS: Record<RecommendationLabel, string> = {
  'HIGHLY RECOMMENDED': 'Apply immediately with standard application',
  RECOMMENDED: 'Apply with tailored resume and cover letter',
  CONSIDER: 'Apply only if genuinely interested and willing to learn',
  'NOT RECOMMENDED': 'Focus on better-matching opportunities',
};

export function recommendationFor(score: number, thresholds: RecommendationThresholds): RecommendationLabel {
  if (score >= thresholds.highlyRecommended) return 'HIGHLY RECOMMENDED';
  if (score >= thresholds.recommended) return 'RECOMMENDED';
  if (score >= thresholds.consider) return 'CONSIDER';
  return 'NOT RECOMMENDED';
}

export function confidenceFor(score: number, weaknessCount: number): ConfidenceLevel {
  if (score > 0.8 && weaknessCount <= 1) return 'HIGH';
  if (score > 0.6 && weaknessCount <= 2) return 'MEDIUM';
  return 'LOW';
}

/**
 * Weighted multi-factor match of one resume against one posting. Missing
 * optional data lowers the affected dimension instead of failing the match.
 */
export class CompositeMatcher {
  readonly weights: MatchWeights;
  readonly thresholds: RecommendationThresholds;
  readonly skillThreshold: number;
  private readonly ctx: ScoringContext;

  constructor(options: CompositeMatcherOptions) {
    const config = options.config ?? matchConfig;
    this.weights = options.weights ?? config.weights;
    validateWeights(this.weights);

    this.thresholds = options.thresholds ?? config.thresholds;
    this.skillThreshold = options.skillThreshold ?? config.skillMatchThreshold;
    this.ctx = { scorer: options.scorer, config: { ...config, weights: this.weights, thresholds: this.thresholds } };
  }

  async match(resume: ParsedResume, job: JobRequirement, preferences?: Partial<MatchPreferences>): Promise<MatchResult> {
    const prefs: MatchPreferences = { ...this.ctx.config.defaultPreferences, ...preferences };
    const { config } = this.ctx;

    const [skills, skillLists] = await Promise.all([
      scoreSkills(resume, job, this.ctx),
      this.classifySkills(resume, job),
    ]);

    const scores: DimensionScores = {
      skills,
      experience: clamp(scoreExperience(resume, job, config)),
      education: clamp(scoreEducation(resume, job, config)),
      location: clamp(scoreLocation(resume, job, prefs)),
      culture: clamp(scoreCulture(resume, job, config)),
      salary: clamp(scoreSalary(job, prefs)),
    };

    const weighted = DIMENSIONS.reduce((sum, dimension) => sum + scores[dimension] * this.weights[dimension], 0);
    // Rounded so that float drift cannot drop a score below a threshold it meets
    const overallScore = clamp(Math.round(weighted * 1e9) / 1e9);

    const analysis = this.analyse(resume, job, scores, overallScore, skillLists.missing);
    const recommendation = recommendationFor(overallScore, this.thresholds);

    return {
      jobId: job.id,
      overallScore,
      scores,
      analysis,
      recommendation,
      recommendationDetail: RECOMMENDATION_DETAILS[recommendation],
      matchingSkills: skillLists.matching,
      missingSkills: skillLists.missing,
      confidence: confidenceFor(overallScore, analysis.weaknesses.length),
    };
  }

  private async classifySkills(resume: ParsedResume, job: JobRequirement) {
    const skills = candidateSkills(resume);
    const matching: string[] = [];
    const missing: string[] = [];
    if (skills.length === 0) {
      return { matching, missing: job.requiredSkills.filter(s => s.trim()) };
    }

    const required = new Set(job.requiredSkills);
    const jobSkills = [...new Set([...job.requiredSkills, ...job.preferredSkills])].filter(s => s.trim());
    const best = await Promise.all(jobSkills.map(skill => bestSkillMatch(skill, skills, this.ctx)));

    jobSkills.forEach((skill, i) => {
      if (best[i] >= this.skillThreshold) {
        matching.push(skill);
      } else if (required.has(skill)) {
        missing.push(skill);
      }
    });

    return { matching, missing };
  }

  private analyse(
    resume: ParsedResume,
    job: JobRequirement,
    scores: DimensionScores,
    overallScore: number,
    missingSkills: string[]
  ): MatchAnalysis {
    const analysis: MatchAnalysis = {
      strengths: [],
      weaknesses: [],
      recommendations: [],
      skillGaps: missingSkills,
      experienceAssessment: '',
      educationAssessment: '',
      locationNotes: '',
      overallAssessment: '',
    };

    if (scores.skills > 0.8) {
      analysis.strengths.push('Excellent skill match with job requirements');
    } else if (scores.skills > 0.6) {
      analysis.strengths.push('Good skill match with some relevant experience');
    }
    if (scores.experience > 0.8) analysis.strengths.push('Experience level aligns well with position');
    if (scores.location > 0.8) analysis.strengths.push('Location is compatible with job requirements');
    if (scores.salary >= 1 && job.salaryRange) analysis.strengths.push('Salary range meets expectations');

    if (scores.skills < 0.5) analysis.weaknesses.push('Limited skill match with job requirements');
    if (scores.experience < 0.5) analysis.weaknesses.push('Experience level may not meet job requirements');
    if (scores.education < 0.5) analysis.weaknesses.push('Education requirements may not be fully met');

    if (scores.skills < 0.7) analysis.recommendations.push('Consider acquiring missing technical skills');
    if (scores.experience < 0.7) analysis.recommendations.push('Highlight relevant project experience');
    if (scores.education < 0.8) analysis.recommendations.push('Emphasise certifications and equivalent experience');

    const range = resolveExperienceLevel(job.experienceLevel, this.ctx.config);
    if (!range) {
      analysis.experienceAssessment = `Unrecognised experience level "${job.experienceLevel}"`;
    } else if (resume.totalExperienceYears - range.minYears > 2 && resume.totalExperienceYears > range.maxYears) {
      analysis.experienceAssessment = 'Over-qualified based on years of experience';
    } else if (resume.totalExperienceYears >= range.minYears) {
      analysis.experienceAssessment = 'Meets experience requirements';
    } else {
      analysis.experienceAssessment = 'Below minimum experience requirements';
    }

    if (scores.education >= 1) {
      analysis.educationAssessment = job.educationRequired ? 'Meets education requirements' : 'No education requirement';
    } else if (resume.education.length === 0) {
      analysis.educationAssessment = 'No education listed on resume';
    } else {
      analysis.educationAssessment = 'Below required education level';
    }

    if (job.remoteFriendly) {
      analysis.locationNotes = 'Remote-friendly position';
    } else if (scores.location >= 0.8) {
      analysis.locationNotes = `On-site in ${job.location}, matches location preferences`;
    } else {
      analysis.locationNotes = job.location ? `On-site in ${job.location}, outside preferred locations` : 'Location not stated';
    }

    if (overallScore > 0.8) {
      analysis.overallAssessment = 'Excellent match - highly recommended to apply';
    } else if (overallScore > 0.6) {
      analysis.overallAssessment = 'Good match - recommended to apply';
    } else if (overallScore > 0.4) {
      analysis.overallAssessment = 'Moderate match - consider applying with tailored application';
    } else {
      analysis.overallAssessment = 'Poor match - may not be suitable';
    }

    return analysis;
  }
}
