import { env } from './config.js';
import { openIndex, argValue, positionalArgs } from './cli.js';
import { loadJobs, loadPreferences, loadResume } from './input.js';
import { CompositeMatcher } from './matching/compositeMatcher.js';
import { runPipeline } from './pipeline.js';

async function main() {
  console.log('🎯 Job Matcher - Starting...\n');
  console.log(`Mode: ${env.DRY_RUN ? 'DRY RUN' : 'LIVE'}\n`);

  const [resumePath, jobsPath] = positionalArgs(['--preferences']);
  if (!resumePath || !jobsPath) {
    console.log('Usage: tsx src/index.ts <resume.json> <jobs.json> [--preferences prefs.json]');
    process.exit(1);
  }

  const { index, scorer } = openIndex();
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nInterrupted - finishing the current job and skipping the rest...');
    controller.abort();
  });

  try {
    const resume = loadResume(resumePath);
    const jobs = loadJobs(jobsPath);
    const preferencesPath = argValue('--preferences');
    const preferences = preferencesPath ? loadPreferences(preferencesPath) : undefined;

    console.log(`Loaded resume for ${resume.contactInfo.name || 'candidate'} and ${jobs.length} jobs`);

    const matcher = new CompositeMatcher({ scorer });
    const { outcomes } = await runPipeline(resume, jobs, index, matcher, {
      preferences,
      signal: controller.signal,
    });

    console.log('\nRanked matches:');
    outcomes.forEach(({ job, match, insights, decision, recorded }, i) => {
      console.log(`  ${i + 1}. [${(match.overallScore * 100).toFixed(1)}%] ${job.title} @ ${job.company} (${job.location || 'n/a'})`);
      console.log(`     ${match.recommendation}: ${match.recommendationDetail} | confidence ${match.confidence}`);
      console.log(`     Decision: ${decision}${recorded ? ' (recorded)' : ''}`);
      if (match.missingSkills.length > 0) {
        console.log(`     Missing: ${match.missingSkills.join(', ')}`);
      }
      if (decision !== 'skip') {
        console.log(`     Strategy: ${insights.applicationStrategy}`);
      }
    });

    if (scorer.fallbackCount > 0) {
      console.log(`\n⚠️  ${scorer.fallbackCount} similarity calls fell back to lexical scoring`);
    }

    const autoApply = outcomes.filter(o => o.decision === 'auto-apply').length;
    const manual = outcomes.filter(o => o.decision === 'manual-review').length;
    console.log('\n✅ Job Matcher completed successfully!');
    console.log(`   Auto-apply: ${autoApply}, manual review: ${manual}, skipped: ${outcomes.length - autoApply - manual}`);
  } finally {
    index.close();
  }
}

main().catch(error => {
  console.error('\n❌ Job Matcher failed:', error);
  process.exit(1);
});
