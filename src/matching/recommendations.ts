import { matchConfig, type RecommendationThresholds } from '../config.js';
import type { ApplicationInsights, MatchResult, ParsedResume } from '../types.js';

const MAX_SKILLS_TO_DEVELOP = 5;

function confidenceOf(resume: ParsedResume, skill: string): number {
  const key = skill.toLowerCase();
  for (const [name, score] of Object.entries(resume.skillConfidenceScores)) {
    if (name.toLowerCase() === key) return score;
  }
  return 0;
}

export function applicationStrategy(score: number, thresholds: RecommendationThresholds = matchConfig.thresholds): string {
  if (score >= thresholds.highlyRecommended) {
    return 'Apply with confidence using standard approach';
  }
  if (score >= thresholds.recommended) {
    return 'Customize application to emphasize matching qualifications';
  }
  if (score >= thresholds.consider) {
    return 'Apply only if genuinely interested, and address the skill gaps in your cover letter';
  }
  return 'Consider reaching out to hiring manager or employee referral';
}

/** Application advice derived from a finished match. No I/O. */
export function generateApplicationInsights(
  match: MatchResult,
  resume: ParsedResume,
  thresholds: RecommendationThresholds = matchConfig.thresholds
): ApplicationInsights {
  const insights: ApplicationInsights = {
    resumeOptimization: [],
    coverLetterPoints: [],
    interviewPreparation: [],
    // Stable sort keeps the posting's order among equally confident skills
    skillsToHighlight: [...match.matchingSkills].sort((a, b) => confidenceOf(resume, b) - confidenceOf(resume, a)),
    skillsToDevelop: match.missingSkills.slice(0, MAX_SKILLS_TO_DEVELOP),
    applicationStrategy: applicationStrategy(match.overallScore, thresholds),
  };

  if (match.scores.skills < 0.7) {
    insights.resumeOptimization.push('Emphasize relevant technical skills more prominently');
  }
  if (match.scores.experience < 0.7) {
    insights.resumeOptimization.push('Quantify achievements with specific metrics');
  }

  for (const strength of match.analysis.strengths) {
    insights.coverLetterPoints.push(`Highlight: ${strength}`);
  }
  if (resume.primaryDomain) {
    insights.coverLetterPoints.push(`Frame experience around your ${resume.primaryDomain.replace(/_/g, ' ')} background`);
  }

  if (match.missingSkills.length > 0) {
    insights.interviewPreparation.push(
      `Prepare to discuss how you would quickly learn: ${match.missingSkills.slice(0, 3).join(', ')}`
    );
  }

  return insights;
}
