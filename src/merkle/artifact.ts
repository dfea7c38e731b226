// src/merkle/artifact.ts
// Reading and checking distribution artifacts

import fs from 'fs';
import { tryConstructLeaf } from './tree';
import { DistributionArtifact, MerkleProof } from './types';
import { parseDigestHex, verifyProof } from './verifier';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseProofEntry(value: unknown, position: number): MerkleProof {
  if (!isRecord(value)) {
    throw new Error(`proofs[${position}] is not an object`);
  }

  const { index, wallet, amount, proof } = value;

  if (typeof wallet !== 'string' || typeof amount !== 'string') {
    throw new Error(`proofs[${position}] must have string wallet and amount`);
  }
  if (!Array.isArray(proof) || !proof.every((p): p is string => typeof p === 'string')) {
    throw new Error(`proofs[${position}].proof must be an array of hex strings`);
  }

  return {
    index: typeof index === 'number' ? index : position,
    wallet,
    amount,
    proof,
  };
}

/**
 * Shape-check parsed JSON as a distribution artifact
 */
export function parseArtifact(raw: unknown): DistributionArtifact {
  if (!isRecord(raw)) {
    throw new Error('Artifact must be a JSON object');
  }

  const { merkleRoot, proofs, numRecipients, totalAmount, createdAt, version } = raw;

  if (typeof merkleRoot !== 'string') {
    throw new Error('Missing merkleRoot');
  }
  if (!Array.isArray(proofs)) {
    throw new Error('Missing proofs');
  }

  const entries = proofs.map(parseProofEntry);

  return {
    merkleRoot,
    proofs: entries,
    numRecipients: typeof numRecipients === 'number' ? numRecipients : entries.length,
    totalAmount: typeof totalAmount === 'string' ? totalAmount : '0',
    createdAt: typeof createdAt === 'string' ? createdAt : undefined,
    version: typeof version === 'string' ? version : undefined,
  };
}

/**
 * Load distribution artifact from file
 */
export function loadArtifact(artifactPath: string): DistributionArtifact {
  const content = fs.readFileSync(artifactPath, 'utf8');
  return parseArtifact(JSON.parse(content));
}

/**
 * Validate artifact integrity: totals, counts, and every proof against the root
 */
export function validateArtifact(artifact: DistributionArtifact): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  const root = parseDigestHex(artifact.merkleRoot);
  if (!root) errors.push('merkleRoot is not a 32-byte hex digest');
  if (artifact.proofs.length === 0) errors.push('Missing or empty proofs');

  if (artifact.proofs.length !== artifact.numRecipients) {
    errors.push(
      `Recipient count mismatch: ${artifact.numRecipients} vs ${artifact.proofs.length} proofs`
    );
  }

  let proofTotal = 0n;
  const seen = new Set<string>();

  for (const entry of artifact.proofs) {
    if (seen.has(entry.wallet)) {
      errors.push(`Duplicate recipient: ${entry.wallet}`);
    }
    seen.add(entry.wallet);

    if (!/^\d+$/.test(entry.amount)) {
      errors.push(`Invalid amount for ${entry.wallet}: ${entry.amount}`);
      continue;
    }
    proofTotal += BigInt(entry.amount);

    const leaf = tryConstructLeaf(entry.wallet, BigInt(entry.amount));
    const nodes = entry.proof.map(parseDigestHex);
    const proof = nodes.filter((n): n is Buffer => n !== null);

    if (!root || !leaf || proof.length !== nodes.length || !verifyProof(leaf, proof, root)) {
      errors.push(`Proof does not verify for ${entry.wallet}`);
    }
  }

  if (proofTotal.toString() !== artifact.totalAmount) {
    errors.push(
      `Total mismatch: artifact says ${artifact.totalAmount}, proofs sum to ${proofTotal}`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Look up a recipient's entry in an artifact
 */
export function findEntitlement(
  artifact: DistributionArtifact,
  wallet: string
): MerkleProof | undefined {
  return artifact.proofs.find((p) => p.wallet === wallet);
}
