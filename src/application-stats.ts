import { openIndex } from './cli.js';
import type { ApplicationStats } from './types.js';

function printBreakdown(title: string, counts: Record<string, number>, limit = 10) {
  const rows = Object.entries(counts).sort((a, b) => b[1] - a[1]).slice(0, limit);
  if (rows.length === 0) return;
  console.log(`\n${title}:`);
  for (const [key, count] of rows) {
    console.log(`  ${key}: ${count}`);
  }
}

function printStats(stats: ApplicationStats) {
  console.log('📊 Application Statistics');
  console.log(`  Total applications: ${stats.totalApplications}`);
  console.log(`  Last 7 days: ${stats.recentApplications}`);
  console.log(`  Recorded as related to an earlier posting: ${stats.duplicatesDetected}`);
  printBreakdown('By status', stats.byStatus);
  printBreakdown('By source', stats.bySource);
  printBreakdown('Top companies', stats.byCompany);
}

async function main() {
  const { index } = openIndex();
  try {
    printStats(index.getStats());
  } finally {
    index.close();
  }
}

main().catch(error => {
  console.error('❌ Stats failed:', error);
  process.exit(1);
});
