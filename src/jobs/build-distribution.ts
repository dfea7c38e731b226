// src/jobs/build-distribution.ts
// CLI tool to build a distribution artifact from a wallet,amount CSV

import fs from 'fs';
import path from 'path';
import { validateArtifact } from '../merkle/artifact';
import { buildArtifact, parseEntitlementsCsv, saveArtifact } from '../merkle/builder';

function main() {
  const [csvPath, outArg] = process.argv.slice(2);

  if (!csvPath) {
    console.log('Usage: npx tsx src/jobs/build-distribution.ts <csv-path> [out-path]');
    console.log('');
    console.log('Builds the Merkle root and every recipient proof from a CSV');
    console.log('with wallet and amount (raw token units) columns.');
    process.exitCode = 1;
    return;
  }

  if (!fs.existsSync(csvPath)) {
    console.error(`❌ File not found: ${csvPath}`);
    process.exitCode = 1;
    return;
  }

  console.log('🌳 Building distribution\n');
  console.log(`Source: ${csvPath}`);
  console.log('-'.repeat(60));

  const artifact = buildArtifact(parseEntitlementsCsv(fs.readFileSync(csvPath, 'utf8')));

  const validation = validateArtifact(artifact);
  if (!validation.valid) {
    console.error('❌ Artifact validation failed:');
    validation.errors.forEach((e) => console.error(`  - ${e}`));
    process.exitCode = 1;
    return;
  }

  const outPath =
    outArg ?? path.join(process.cwd(), 'distributions', `${path.basename(csvPath, '.csv')}_merkle.json`);
  saveArtifact(artifact, outPath);

  console.log(`  Recipients: ${artifact.numRecipients}`);
  console.log(`  Total:      ${artifact.totalAmount}`);
  console.log(`  Root:       ${artifact.merkleRoot}`);
  console.log('');
  console.log(`✅ Artifact saved: ${outPath}`);
  console.log('');
  console.log('Next step:');
  console.log(`  npx tsx src/jobs/set-root.ts ${outPath}`);
}

try {
  main();
} catch (e) {
  console.error('Error:', e instanceof Error ? e.message : e);
  process.exitCode = 1;
}
