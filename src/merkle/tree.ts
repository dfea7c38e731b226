// src/merkle/tree.ts
// Hashing primitives, leaf encoding and tree construction

import { keccak256 } from 'js-sha3';
import { PublicKey } from '@solana/web3.js';
import { DIGEST_LENGTH, Entitlement, LEAF_DOMAIN, MAX_AMOUNT, MerkleProof } from './types';

/**
 * Hash function for Merkle tree nodes (Keccak-256)
 */
export function hash(data: Buffer): Buffer {
  return Buffer.from(keccak256.arrayBuffer(data));
}

/**
 * Hash two child nodes to produce parent.
 * Children are ordered by byte value, so proofs carry no direction bits.
 */
export function hashPair(left: Buffer, right: Buffer): Buffer {
  if (left.length !== DIGEST_LENGTH || right.length !== DIGEST_LENGTH) {
    throw new Error(`hashPair expects ${DIGEST_LENGTH}-byte nodes`);
  }

  const [first, second] = Buffer.compare(left, right) <= 0
    ? [left, right]
    : [right, left];

  return hash(Buffer.concat([first, second]));
}

/**
 * Encode an amount as 8-byte little-endian (u64)
 */
export function encodeAmount(amount: bigint): Buffer {
  if (amount <= 0n || amount > MAX_AMOUNT) {
    throw new Error(`Amount out of range: ${amount}`);
  }

  const buf = Buffer.alloc(8);
  buf.writeBigUInt64LE(amount);
  return buf;
}

/**
 * Construct a leaf for the Merkle tree
 *
 * leaf = keccak256(LEAF_DOMAIN || recipient || amount)
 *
 * Every field is fixed width: 20-byte tag, 32-byte pubkey, 8-byte u64 LE.
 */
export function constructLeaf(wallet: string, amount: bigint): Buffer {
  const recipient = new PublicKey(wallet);

  const data = Buffer.concat([
    Buffer.from(LEAF_DOMAIN),
    recipient.toBuffer(),
    encodeAmount(amount),
  ]);

  return hash(data);
}

/**
 * Like constructLeaf, but returns null for anything that cannot be encoded
 * (bad base58, wrong key length, amount outside u64).
 */
export function tryConstructLeaf(wallet: string, amount: bigint): Buffer | null {
  try {
    return constructLeaf(wallet, amount);
  } catch {
    return null;
  }
}

/**
 * MerkleTree class for building trees and generating proofs
 */
export class MerkleTree {
  private leaves: Buffer[];
  private layers: Buffer[][];

  constructor(leaves: Buffer[]) {
    if (leaves.length === 0) {
      throw new Error('Cannot create Merkle tree with no leaves');
    }

    this.leaves = leaves;
    this.layers = this.buildLayers();
  }

  private buildLayers(): Buffer[][] {
    const layers: Buffer[][] = [this.leaves];
    let current = this.leaves;

    while (current.length > 1) {
      const next: Buffer[] = [];

      for (let i = 0; i < current.length; i += 2) {
        // Odd node at the end pairs with itself
        const right = i + 1 < current.length ? current[i + 1] : current[i];
        next.push(hashPair(current[i], right));
      }

      layers.push(next);
      current = next;
    }

    return layers;
  }

  getRoot(): Buffer {
    return this.layers[this.layers.length - 1][0];
  }

  getRootHex(): string {
    return this.getRoot().toString('hex');
  }

  /**
   * Number of proof elements for every leaf
   */
  getDepth(): number {
    return this.layers.length - 1;
  }

  /**
   * Generate proof for a leaf at given index
   */
  getProof(index: number): Buffer[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.leaves.length) {
      throw new Error(`Invalid leaf index: ${index}`);
    }

    const proof: Buffer[] = [];
    let currentIndex = index;

    for (let i = 0; i < this.layers.length - 1; i++) {
      const layer = this.layers[i];
      const siblingIndex = currentIndex % 2 === 1 ? currentIndex - 1 : currentIndex + 1;

      proof.push(siblingIndex < layer.length ? layer[siblingIndex] : layer[currentIndex]);
      currentIndex = Math.floor(currentIndex / 2);
    }

    return proof;
  }

  getProofHex(index: number): string[] {
    return this.getProof(index).map((p) => p.toString('hex'));
  }
}

/**
 * Build a tree and every recipient's proof from a list of entitlements
 */
export function buildMerkleData(entries: Entitlement[]): {
  tree: MerkleTree;
  root: string;
  proofs: MerkleProof[];
} {
  const tree = new MerkleTree(entries.map((e) => constructLeaf(e.wallet, e.amount)));

  const proofs: MerkleProof[] = entries.map((entry, index) => ({
    index,
    wallet: entry.wallet,
    amount: entry.amount.toString(),
    proof: tree.getProofHex(index),
  }));

  return { tree, root: tree.getRootHex(), proofs };
}
