import { config } from 'dotenv';
import { z } from 'zod';
import type { DimensionName, MatchPreferences } from './types.js';

config({ quiet: true });

const envSchema = z.object({
  // Optional - semantic similarity falls back to lexical without it
  OPENAI_API_KEY: z.string().min(1).optional(),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  APPLICATIONS_DB_PATH: z.string().min(1).default('applications.db'),
  MATCH_CONCURRENCY: z.coerce.number().int().positive().default(5),
  MIN_SALARY: z.coerce.number().nonnegative().default(50000),
  RECORD_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.6),
  AUTO_APPLY_SCORE: z.coerce.number().min(0).max(1).default(0.8),

  DRY_RUN: z.string().optional().transform(val => val === 'true'),
});

function loadEnv() {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('Missing or invalid environment variables:');
    console.error(result.error.message);
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();

export type MatchWeights = Record<DimensionName, number>;

export interface RecommendationThresholds {
  highlyRecommended: number;
  recommended: number;
  consider: number;
}

export interface MatchConfig {
  weights: MatchWeights;
  thresholds: RecommendationThresholds;
  skillMatchThreshold: number;
  requiredSkillWeight: number;
  preferredSkillWeight: number;
  experienceLevels: Record<string, { minYears: number; maxYears: number }>;
  experienceLevelAliases: Record<string, string>;
  educationHierarchy: { pattern: RegExp; level: number }[];
  domainIndustries: Record<string, string[]>;
  largeEmployers: string[];
  smallCompanySizes: string[];
  defaultPreferences: MatchPreferences;
}

// Hand-picked weights and thresholds, pending calibration against outcomes
export const matchConfig: MatchConfig = {
  weights: {
    skills: 0.35,
    experience: 0.25,
    education: 0.10,
    location: 0.15,
    culture: 0.10,
    salary: 0.05,
  },
  thresholds: {
    highlyRecommended: 0.8,
    recommended: 0.6,
    consider: 0.4,
  },
  skillMatchThreshold: 0.85,
  requiredSkillWeight: 0.8,
  preferredSkillWeight: 0.2,
  experienceLevels: {
    junior: { minYears: 0, maxYears: 2 },
    mid: { minYears: 2, maxYears: 5 },
    senior: { minYears: 5, maxYears: 10 },
    lead: { minYears: 8, maxYears: 15 },
  },
  experienceLevelAliases: {
    entry: 'junior',
    'entry-level': 'junior',
    'entry level': 'junior',
    jr: 'junior',
    intermediate: 'mid',
    'mid-level': 'mid',
    'mid level': 'mid',
    sr: 'senior',
    principal: 'lead',
    staff: 'lead',
  },
  educationHierarchy: [
    { pattern: /high\s*school|\bged\b/i, level: 1 },
    { pattern: /associate/i, level: 2 },
    { pattern: /bachelor|\bb\.?sc?\b|\bb\.?a\b|\bb\.?eng\b/i, level: 3 },
    { pattern: /master|\bm\.?sc?\b|\bm\.?a\b|\bmba\b|\bm\.?eng\b/i, level: 4 },
    { pattern: /doctor|\bph\.?d\b/i, level: 5 },
  ],
  domainIndustries: {
    cybersecurity: ['security', 'financial services', 'technology'],
    data_science: ['technology', 'healthcare', 'finance'],
    web_technologies: ['technology', 'e-commerce', 'media'],
  },
  largeEmployers: ['google', 'microsoft', 'amazon', 'apple', 'meta', 'netflix'],
  smallCompanySizes: ['startup', 'small'],
  defaultPreferences: {
    preferredLocations: [],
    minSalary: env.MIN_SALARY,
  },
};

export interface DedupThresholds {
  highSimilarity: number;
  potentialDuplicate: number;
  titleSimilarity: number;
  companySimilarity: number;
  descriptionSimilarity: number;
}

export interface DedupConfig {
  thresholds: DedupThresholds;
  descriptionPrefixLength: number;
  jobBoardPatterns: { platform: string; pattern: RegExp }[];
  titleNoisePrefixes: string[];
  titleNoiseSuffixes: RegExp[];
  titleSynonyms: Record<string, string[]>;
  companyAliases: Record<string, string[]>;
  companySuffixes: string[];
}

export const dedupConfig: DedupConfig = {
  thresholds: {
    highSimilarity: 0.85,
    potentialDuplicate: 0.7,
    titleSimilarity: 0.8,
    companySimilarity: 0.9,
    descriptionSimilarity: 0.7,
  },
  descriptionPrefixLength: 500,
  jobBoardPatterns: [
    { platform: 'linkedin', pattern: /linkedin\.com\/jobs\/view\/(?:[^/?#]*-)?(\d+)/i },
    { platform: 'indeed', pattern: /indeed\.[a-z.]+\/.*[?&]jk=([a-f0-9]+)/i },
    { platform: 'glassdoor', pattern: /glassdoor\.[a-z.]+\/.*[?&]jobListingId=(\d+)/i },
    { platform: 'greenhouse', pattern: /greenhouse\.io\/[^/]+\/jobs\/(\d+)/i },
    { platform: 'lever', pattern: /jobs\.lever\.co\/[^/]+\/([a-f0-9-]{36})/i },
    { platform: 'remoteok', pattern: /remoteok\.(?:com|io)\/(?:remote-jobs|l)\/(?:[^/?#]*-)?(\d+)/i },
  ],
  titleNoisePrefixes: ['looking for', 'we are hiring', 'hiring', 'urgent', 'urgently', 'immediate', 'now hiring'],
  titleNoiseSuffixes: [
    /\s*[-–|]\s*(remote|hybrid|on-?site|urgent)$/,
    /\s*\((remote|hybrid|on-?site|m\/w\/[dx*]|all genders?)\)$/,
  ],
  titleSynonyms: {
    frontend: ['front-end', 'front end'],
    backend: ['back-end', 'back end'],
    fullstack: ['full-stack', 'full stack'],
    senior: ['sr', 'snr'],
    junior: ['jr', 'jnr'],
    engineer: ['developer', 'programmer', 'dev'],
    'product manager': ['pm', 'product owner'],
    'machine learning': ['ml'],
  },
  companyAliases: {
    google: ['alphabet', 'google llc', 'google inc'],
    meta: ['facebook', 'meta platforms', 'facebook inc'],
    amazon: ['amazon web services', 'aws', 'amazon.com'],
    microsoft: ['msft', 'microsoft corporation'],
    apple: ['apple inc', 'apple computer'],
    netflix: ['netflix inc', 'netflix.com'],
    tesla: ['tesla inc', 'tesla motors'],
    uber: ['uber technologies', 'uber inc'],
    airbnb: ['airbnb inc', 'airbnb.com'],
  },
  companySuffixes: ['incorporated', 'inc', 'llc', 'ltd', 'limited', 'corp', 'corporation', 'company', 'co', 'gmbh', 'plc', 'ag'],
};
