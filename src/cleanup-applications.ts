import { argValue, openIndex } from './cli.js';

async function main() {
  const daysOld = Number(argValue('--days') ?? 30);
  if (!Number.isFinite(daysOld) || daysOld < 0) {
    throw new Error(`--days must be a non-negative number, got "${argValue('--days')}"`);
  }

  console.log(`Finding rejected/unanswered applications older than ${daysOld} days...\n`);

  const { index } = openIndex();
  try {
    const stale = index.findStaleApplications(daysOld);

    if (stale.length === 0) {
      console.log('Nothing to clean up.');
      return;
    }

    for (const record of stale) {
      console.log(`  ${record.applicationDate.slice(0, 10)} [${record.status}] ${record.jobTitle} @ ${record.company}`);
    }
    console.log('');

    // Ask for confirmation via command line arg
    if (process.argv.includes('--confirm')) {
      console.log(`Deleting ${stale.length} old applications...`);
      await index.removeApplications(stale.map(record => record.id));
      console.log('Done!');
    } else {
      console.log(`Would delete ${stale.length} old applications.`);
      console.log('Run with --confirm to actually delete them.');
    }
  } finally {
    index.close();
  }
}

main().catch(error => {
  console.error('❌ Cleanup failed:', error);
  process.exit(1);
});
