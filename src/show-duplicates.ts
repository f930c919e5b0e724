import { openIndex } from './cli.js';

async function main() {
  console.log('Finding potential duplicate applications...\n');

  const { index } = openIndex();
  try {
    const duplicates = await index.getPotentialDuplicates();

    if (duplicates.length === 0) {
      console.log('No duplicates found!');
      return;
    }

    console.log(`Found ${duplicates.length} related pairs:\n`);

    duplicates.forEach((dup, i) => {
      const first = index.get(dup.candidateId);
      const second = index.get(dup.existingId);
      if (!first || !second) return;

      console.log(`${i + 1}. "${first.jobTitle}" @ ${first.company}`);
      console.log(`   <-> "${second.jobTitle}" @ ${second.company}`);
      console.log(`   Similarity: ${dup.similarityScore.toFixed(3)} (${dup.matchType})`);
      console.log(`   Factors: ${dup.matchingFactors.join(', ')}`);
      console.log('');
    });
  } finally {
    index.close();
  }
}

main().catch(error => {
  console.error('❌ Duplicate audit failed:', error);
  process.exit(1);
});
