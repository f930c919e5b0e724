import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { JobRequirement, ParsedResume } from '../types.js';

export function makeResume(overrides: Partial<ParsedResume> = {}): ParsedResume {
  return {
    contactInfo: {
      name: 'Test Candidate',
      email: 'candidate@example.com',
      phone: '',
      linkedin: null,
      github: null,
      portfolio: null,
      location: 'Berlin, Germany',
    },
    summary: 'Backend engineer',
    skills: {
      languages: ['Python', 'TypeScript'],
      cloud: ['AWS'],
    },
    workExperience: [
      {
        title: 'Software Engineer',
        company: 'Small Co',
        location: 'Berlin',
        startDate: '2019-01',
        endDate: null,
        durationMonths: 72,
        responsibilities: [],
        achievements: [],
        skillsUsed: ['Python'],
      },
    ],
    education: [{ degree: 'Master of Science', field: 'Computer Science', institution: 'Test University', graduationYear: '2018' }],
    totalExperienceYears: 6,
    seniorityLevel: 'senior',
    primaryDomain: 'web_technologies',
    skillConfidenceScores: {},
    ...overrides,
  };
}

export function makeJob(overrides: Partial<JobRequirement> = {}): JobRequirement {
  return {
    id: 'job-1',
    title: 'Senior Backend Engineer',
    company: 'Startup GmbH',
    location: 'Remote',
    description: 'Build APIs in Python on AWS.',
    requiredSkills: ['python', 'aws'],
    preferredSkills: ['typescript'],
    experienceLevel: 'senior',
    educationRequired: 'Bachelor',
    salaryRange: [70000, 90000],
    jobType: 'full-time',
    remoteFriendly: true,
    industry: 'Technology',
    companySize: 'Startup',
    benefits: [],
    applicationUrl: null,
    sourcePlatform: 'test',
    postedDate: null,
    ...overrides,
  };
}

export function tempDbPath(name = 'applications.db'): string {
  return join(mkdtempSync(join(tmpdir(), 'job-match-')), name);
}
