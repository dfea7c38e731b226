// src/merkle/builder.ts
// Builds distribution artifacts from entitlement CSVs

import fs from 'fs';
import path from 'path';
import { buildMerkleData } from './tree';
import { DistributionArtifact, Entitlement } from './types';
import { isValidWalletAddress } from '../utils/wallet';

export const ARTIFACT_VERSION = '1.0.0';

/**
 * Parse `wallet,amount` CSV text into entitlements.
 * Rows with a zero amount are skipped; anything else malformed throws.
 */
export function parseEntitlementsCsv(text: string): Entitlement[] {
  const [header, ...lines] = text.trim().split(/\r?\n/);
  const headers = header.split(',').map((h) => h.trim().toLowerCase());

  const walletIdx = headers.indexOf('wallet');
  const amountIdx = headers.indexOf('amount');

  if (walletIdx === -1 || amountIdx === -1) {
    throw new Error('CSV must include wallet, amount columns');
  }

  const entries: Entitlement[] = [];

  lines.forEach((line, i) => {
    if (line.trim() === '') return;

    const cols = line.split(',').map((c) => c.trim());
    const wallet = cols[walletIdx] ?? '';
    const rawAmount = cols[amountIdx] ?? '';

    if (!isValidWalletAddress(wallet)) {
      throw new Error(`Row ${i + 2}: invalid wallet "${wallet}"`);
    }
    if (!/^\d+$/.test(rawAmount)) {
      throw new Error(`Row ${i + 2}: invalid amount "${rawAmount}"`);
    }

    const amount = BigInt(rawAmount);
    if (amount > 0n) {
      entries.push({ wallet, amount });
    }
  });

  return entries;
}

/**
 * Build a complete artifact. Each wallet may appear once.
 */
export function buildArtifact(
  entries: Entitlement[],
  createdAt: Date = new Date()
): DistributionArtifact {
  if (entries.length === 0) {
    throw new Error('No entitlements to distribute');
  }

  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.wallet)) {
      throw new Error(`Duplicate recipient: ${entry.wallet}`);
    }
    seen.add(entry.wallet);
  }

  const { root, proofs } = buildMerkleData(entries);
  const totalAmount = entries.reduce((sum, e) => sum + e.amount, 0n);

  return {
    merkleRoot: root,
    numRecipients: entries.length,
    totalAmount: totalAmount.toString(),
    proofs,
    createdAt: createdAt.toISOString(),
    version: ARTIFACT_VERSION,
  };
}

/**
 * Save distribution artifact to file
 */
export function saveArtifact(artifact: DistributionArtifact, outPath: string): string {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, JSON.stringify(artifact, null, 2));
  return outPath;
}
