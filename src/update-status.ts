import { openIndex, positionalArgs } from './cli.js';
import { APPLICATION_STATUSES } from './storage/db.js';
import type { ApplicationStatus } from './types.js';

function isStatus(value: string): value is ApplicationStatus {
  return APPLICATION_STATUSES.some(status => status === value);
}

async function main() {
  const [id, status] = positionalArgs();
  if (!id || !status || !isStatus(status)) {
    console.log('Usage: tsx src/update-status.ts <application-id> <status>');
    console.log(`Statuses: ${APPLICATION_STATUSES.join(', ')}`);
    process.exit(1);
  }

  const { index } = openIndex();
  try {
    const record = await index.updateStatus(id, status);
    console.log(`✅ ${record.jobTitle} @ ${record.company} is now "${record.status}"`);
  } finally {
    index.close();
  }
}

main().catch(error => {
  console.error('❌ Status update failed:', error);
  process.exit(1);
});
