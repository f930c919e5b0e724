export interface ContactInfo {
  name: string;
  email: string;
  phone: string;
  linkedin: string | null;
  github: string | null;
  portfolio: string | null;
  location: string | null;
}

export interface WorkExperience {
  title: string;
  company: string;
  location: string;
  startDate: string;
  endDate: string | null; // null while the role is current
  durationMonths: number;
  responsibilities: string[];
  achievements: string[];
  skillsUsed: string[];
}

export interface Education {
  degree: string;
  field: string;
  institution: string;
  graduationYear: string | null;
}

export interface ParsedResume {
  contactInfo: ContactInfo;
  summary: string;
  skills: Record<string, string[]>; // category -> skills
  workExperience: WorkExperience[];
  education: Education[];
  totalExperienceYears: number;
  seniorityLevel: string;
  primaryDomain: string | null;
  skillConfidenceScores: Record<string, number>;
}

export interface JobRequirement {
  id: string;
  title: string;
  company: string;
  location: string;
  description: string;
  requiredSkills: string[];
  preferredSkills: string[];
  experienceLevel: string; // junior, mid, senior, lead
  educationRequired: string | null;
  salaryRange: [min: number, max: number] | null;
  jobType: string;
  remoteFriendly: boolean;
  industry: string | null;
  companySize: string | null;
  benefits: string[];
  applicationUrl: string | null;
  sourcePlatform: string;
  postedDate: string | null;
}

export interface MatchPreferences {
  preferredLocations: string[];
  minSalary: number;
}

export type DimensionName = 'skills' | 'experience' | 'education' | 'location' | 'culture' | 'salary';

export type DimensionScores = Record<DimensionName, number>;

export type RecommendationLabel =
  | 'HIGHLY RECOMMENDED'
  | 'RECOMMENDED'
  | 'CONSIDER'
  | 'NOT RECOMMENDED';

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface MatchAnalysis {
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  skillGaps: string[];
  experienceAssessment: string;
  educationAssessment: string;
  locationNotes: string;
  overallAssessment: string;
}

export interface MatchResult {
  jobId: string;
  overallScore: number;
  scores: DimensionScores;
  analysis: MatchAnalysis;
  recommendation: RecommendationLabel;
  recommendationDetail: string;
  matchingSkills: string[];
  missingSkills: string[];
  confidence: ConfidenceLevel;
}

export interface ApplicationInsights {
  resumeOptimization: string[];
  coverLetterPoints: string[];
  interviewPreparation: string[];
  skillsToHighlight: string[];
  skillsToDevelop: string[];
  applicationStrategy: string;
}

export type ApplicationStatus = 'applied' | 'interviewed' | 'offered' | 'rejected' | 'no_response' | 'withdrawn';

export interface JobApplicationRecord {
  id: string;
  jobTitle: string;
  company: string;
  jobUrl: string;
  applicationDate: string;
  jobDescription: string;
  location: string;
  salaryRange: string;
  jobSource: string;
  status: ApplicationStatus;
  similarityScore: number;
  duplicateOf: string; // empty when the record stands alone
}

export type DuplicateMatchType = 'exact' | 'high_similarity' | 'potential';

export interface DuplicateMatch {
  candidateId: string;
  existingId: string;
  similarityScore: number;
  matchType: DuplicateMatchType;
  matchingFactors: string[];
  confidence: number;
}

export interface ApplicationFields {
  title: string;
  company: string;
  url?: string;
  description?: string;
  location?: string;
  salaryRange?: string;
  source?: string;
}

export interface ApplicationStats {
  totalApplications: number;
  byStatus: Record<string, number>;
  byCompany: Record<string, number>;
  bySource: Record<string, number>;
  duplicatesDetected: number;
  recentApplications: number;
}
