// src/jobs/set-root.ts
// Rotate the active Merkle root, signing as the keypair in ADMIN_KEYPAIR

import 'dotenv/config';
import fs from 'fs';
import { createServices } from '../bootstrap';
import { getLedgerConfigFromEnv, loadKeypair } from '../config/service';
import { closePool, getPool } from '../db';
import { loadArtifact, validateArtifact } from '../merkle/artifact';
import { parseDigestHex } from '../merkle/verifier';
import { getRpcConfigFromEnv } from '../utils/rpc';

/**
 * Accept either a root hex string or an artifact path.
 * Artifacts are fully re-verified before their root is used.
 */
function resolveRoot(arg: string): Buffer {
  const direct = parseDigestHex(arg);
  if (direct) return direct;

  if (!fs.existsSync(arg)) {
    throw new Error(`Not a 32-byte hex root or an artifact path: ${arg}`);
  }

  const artifact = loadArtifact(arg);
  const validation = validateArtifact(artifact);
  if (!validation.valid) {
    validation.errors.forEach((e) => console.error(`  - ${e}`));
    throw new Error('Invalid artifact');
  }

  console.log(`Artifact: ${artifact.numRecipients} recipients, total ${artifact.totalAmount}`);
  const root = parseDigestHex(artifact.merkleRoot);
  if (!root) throw new Error('Invalid artifact root');
  return root;
}

async function main() {
  const arg = process.argv[2];

  if (!arg) {
    console.log('Usage: npx tsx src/jobs/set-root.ts <root-hex | artifact-path>');
    console.log('');
    console.log('Required environment variables:');
    console.log('  DATABASE_URL        - PostgreSQL connection string');
    console.log('  ADMIN_KEYPAIR       - Keypair of the authority (or a setRoot grantee)');
    console.log('  CLAIM_MINT, DISTRIBUTOR_KEYPAIR, INITIAL_AUTHORITY, SOLANA_RPC_URL');
    process.exitCode = 1;
    return;
  }

  const adminPath = process.env.ADMIN_KEYPAIR;
  if (!adminPath) {
    throw new Error('Missing ADMIN_KEYPAIR environment variable');
  }
  const caller = loadKeypair(adminPath).publicKey.toBase58();

  const root = resolveRoot(arg);
  const { admin } = createServices(getPool(), getLedgerConfigFromEnv(), getRpcConfigFromEnv());

  const before = await admin.status();
  console.log(`Current root: ${before.root}`);
  console.log(`New root:     ${root.toString('hex')}`);
  console.log(`Caller:       ${caller}`);

  const result = await admin.setRoot(caller, root);
  if (!result.ok) {
    throw new Error(`${result.error.kind}: ${result.error.message}`);
  }

  console.log('✅ Root rotated');
}

main()
  .catch((e) => {
    console.error('❌', e instanceof Error ? e.message : e);
    process.exitCode = 1;
  })
  .finally(() =>
    closePool().catch((e: unknown) => console.error('Pool shutdown failed:', e))
  );
