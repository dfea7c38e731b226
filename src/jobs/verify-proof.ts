// src/jobs/verify-proof.ts
// Check a recipient's entry in a distribution artifact, offline

import fs from 'fs';
import { findEntitlement, loadArtifact } from '../merkle/artifact';
import { tryConstructLeaf } from '../merkle/tree';
import { verifyProofHex } from '../merkle/verifier';

function main() {
  const [artifactPath, wallet, amountArg] = process.argv.slice(2);

  if (!artifactPath || !wallet) {
    console.error('Usage: npx tsx src/jobs/verify-proof.ts <artifact-path> <wallet> [amount]');
    console.error('If amount is omitted, uses the amount stored in the artifact');
    process.exitCode = 1;
    return;
  }

  if (!fs.existsSync(artifactPath)) {
    console.error(`❌ Artifact not found: ${artifactPath}`);
    process.exitCode = 1;
    return;
  }

  const artifact = loadArtifact(artifactPath);
  const entry = findEntitlement(artifact, wallet);

  if (!entry) {
    console.error('❌ Wallet not found in artifact');
    process.exitCode = 1;
    return;
  }

  const amount = amountArg ?? entry.amount;
  if (!/^\d+$/.test(amount)) {
    console.error(`❌ Invalid amount: ${amount}`);
    process.exitCode = 1;
    return;
  }

  const leaf = tryConstructLeaf(wallet, BigInt(amount));
  const valid = leaf !== null && verifyProofHex(leaf.toString('hex'), entry.proof, artifact.merkleRoot);

  console.log(`Wallet: ${wallet}`);
  console.log(`Amount: ${amount}`);
  console.log(`Root:   ${artifact.merkleRoot}`);
  console.log(`Proof:  ${entry.proof.length} nodes`);
  console.log(valid ? '✅ VALID' : '❌ INVALID');

  if (!valid) process.exitCode = 1;
}

main();
