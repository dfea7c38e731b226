// src/merkle/verifier.ts
// Stateless Merkle proof verification

import { hashPair } from './tree';
import { DEFAULT_MAX_PROOF_DEPTH, DIGEST_LENGTH, VerifyOptions } from './types';

const HEX_DIGEST = /^(0x)?[0-9a-fA-F]{64}$/;

function isDigest(value: unknown): value is Buffer {
  return Buffer.isBuffer(value) && value.length === DIGEST_LENGTH;
}

/**
 * Decode a 32-byte hex digest, or null when malformed.
 * Buffer.from(hex) silently drops bad characters, so check the shape first.
 */
export function parseDigestHex(value: unknown): Buffer | null {
  if (typeof value !== 'string' || !HEX_DIGEST.test(value)) {
    return null;
  }
  return Buffer.from(value.replace(/^0x/, ''), 'hex');
}

/**
 * Fold a leaf up through its proof path.
 * Returns null when any node is not a 32-byte digest.
 */
export function processProof(leaf: Buffer, proof: readonly Buffer[]): Buffer | null {
  if (!isDigest(leaf)) return null;

  let computed = leaf;
  for (const sibling of proof) {
    if (!isDigest(sibling)) return null;
    computed = hashPair(computed, sibling);
  }
  return computed;
}

/**
 * Check that `leaf` is a member of the tree committed to by `root`.
 *
 * Never throws: malformed digests and proofs longer than `maxDepth`
 * simply fail verification. An empty proof holds only when leaf == root.
 */
export function verifyProof(
  leaf: Buffer,
  proof: readonly Buffer[],
  root: Buffer,
  options: VerifyOptions = {}
): boolean {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_PROOF_DEPTH;

  if (!Array.isArray(proof) || proof.length > maxDepth) return false;
  if (!isDigest(root)) return false;

  const computed = processProof(leaf, proof);
  return computed !== null && computed.equals(root);
}

/**
 * Verify a proof with hex inputs
 */
export function verifyProofHex(
  leafHex: string,
  proofHex: readonly string[],
  rootHex: string,
  options: VerifyOptions = {}
): boolean {
  if (!Array.isArray(proofHex)) return false;

  const leaf = parseDigestHex(leafHex);
  const root = parseDigestHex(rootHex);
  const proof = proofHex.map(parseDigestHex);

  if (!leaf || !root) return false;

  const nodes: Buffer[] = [];
  for (const node of proof) {
    if (!node) return false;
    nodes.push(node);
  }

  return verifyProof(leaf, nodes, root, options);
}
