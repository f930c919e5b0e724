import { argValue, openIndex } from './cli.js';

// Moves the index to and from the keyed JSON layout used by older installs
async function main() {
  const importPath = argValue('--import');
  const exportPath = argValue('--export');
  if (!importPath && !exportPath) {
    console.log('Usage: tsx src/transfer-applications.ts [--import applications.json] [--export out.json]');
    process.exit(1);
  }

  const { index } = openIndex();
  try {
    if (importPath) {
      const imported = await index.importJsonFile(importPath);
      console.log(`Imported ${imported} applications from ${importPath}`);
    }
    if (exportPath) {
      const exported = index.exportJson(exportPath);
      console.log(`Exported ${exported} applications to ${exportPath}`);
    }
  } finally {
    index.close();
  }
}

main().catch(error => {
  console.error('❌ Transfer failed:', error);
  process.exit(1);
});
