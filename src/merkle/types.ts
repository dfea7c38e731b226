// src/merkle/types.ts
// Core types for Merkle claim verification

/**
 * Width of every digest in the tree (keccak-256 output)
 */
export const DIGEST_LENGTH = 32;

/**
 * Longest proof accepted by the verifier.
 * 32 levels covers trees of up to 2^32 leaves.
 */
export const DEFAULT_MAX_PROOF_DEPTH = 32;

/**
 * Domain separator for leaf hashing.
 * Makes leaf preimages 60 bytes long, so they can never be read as a
 * 64-byte internal node preimage.
 */
export const LEAF_DOMAIN = 'MERKLE_CLAIM_LEAF_V1';

/**
 * Largest amount a leaf can commit to (u64)
 */
export const MAX_AMOUNT = 2n ** 64n - 1n;

/**
 * Root used before any rotation. No leaf hashes to it.
 */
export const ZERO_ROOT = Buffer.alloc(DIGEST_LENGTH);

/**
 * A (recipient, amount) pair from the committed set
 */
export interface Entitlement {
  wallet: string;
  amount: bigint;
}

/**
 * Proof for a single recipient, as serialized in a distribution artifact
 */
export interface MerkleProof {
  index: number;
  wallet: string;
  amount: string; // stringified bigint for JSON serialization
  proof: string[]; // hex-encoded proof nodes
}

/**
 * Distribution artifact handed to recipients and operators.
 * Produced off-system; this service only reads it.
 */
export interface DistributionArtifact {
  merkleRoot: string; // hex-encoded
  numRecipients: number;
  totalAmount: string; // stringified bigint
  proofs: MerkleProof[];
  createdAt?: string;
  version?: string;
}

export interface VerifyOptions {
  maxDepth?: number;
}
