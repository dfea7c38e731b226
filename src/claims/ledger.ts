// src/claims/ledger.ts
// Claim state machine: verify, redeem once, transfer

import { tryConstructLeaf } from '../merkle/tree';
import { DEFAULT_MAX_PROOF_DEPTH, DIGEST_LENGTH } from '../merkle/types';
import { verifyProof } from '../merkle/verifier';
import {
  AccessControl,
  ClaimCompleted,
  ClaimError,
  ClaimStore,
  Result,
  RootRotated,
  TokenLedger,
  TransferInstruction,
  TransferOutcomeUnknownError,
  fail,
  ok,
} from './types';

export interface ClaimLedgerConfig {
  store: ClaimStore;
  tokens: TokenLedger;
  access: AccessControl;
  maxProofDepth?: number;
}

type Listener<T> = (event: T) => void;

export class ClaimLedger {
  private store: ClaimStore;
  private tokens: TokenLedger;
  private access: AccessControl;
  private maxProofDepth: number;

  private claimedListeners = new Set<Listener<ClaimCompleted>>();
  private rotatedListeners = new Set<Listener<RootRotated>>();

  constructor(config: ClaimLedgerConfig) {
    this.store = config.store;
    this.tokens = config.tokens;
    this.access = config.access;
    this.maxProofDepth = config.maxProofDepth ?? DEFAULT_MAX_PROOF_DEPTH;
  }

  /**
   * Redeem `caller`'s entitlement of `amount`.
   *
   * The redemption is recorded before the transfer runs; a failed transfer
   * rejects the store transaction, which discards the record with it.
   * A transfer whose outcome is unknown keeps the record, so the claim
   * cannot be paid twice, and is reported as TransferFailed for an
   * operator to reconcile.
   * Listeners hear about confirmed claims only after the transaction commits.
   */
  async claim(
    caller: string,
    amount: bigint,
    proof: readonly Buffer[]
  ): Promise<Result<TransferInstruction>> {
    if (!(await this.access.isAcceptingClaims())) {
      return fail(new ClaimError('ClaimsPaused', 'Claims are paused'));
    }

    let section: { root: Buffer; unsettled: TransferOutcomeUnknownError | null };
    try {
      section = await this.store.withRecipient(caller, async (tx) => {
        const leaf = tryConstructLeaf(caller, amount);

        if (!leaf || !verifyProof(leaf, proof, tx.root, { maxDepth: this.maxProofDepth })) {
          throw new ClaimError('InvalidProof', 'Proof does not match the current root');
        }

        if (await tx.isClaimed()) {
          throw new ClaimError('AlreadyClaimed', `${caller} has already claimed`);
        }

        await tx.markClaimed(amount);
        const unsettled = await this.transfer(caller, amount);

        return { root: tx.root, unsettled };
      });
    } catch (error) {
      if (error instanceof ClaimError) {
        console.log(`[Ledger] Claim rejected for ${caller}: ${error.kind}`);
        return fail(error);
      }
      throw error;
    }

    if (section.unsettled) {
      console.error(
        `[Ledger] Transfer to ${caller} unsettled (${section.unsettled.signature}); redemption held for reconciliation`
      );
      return fail(
        new ClaimError('TransferFailed', `Transfer to ${caller} could not be confirmed`, {
          cause: section.unsettled,
        })
      );
    }

    const event: ClaimCompleted = { recipient: caller, amount, root: section.root.toString('hex') };
    console.log(`[Ledger] Claimed ${amount} for ${caller}`);
    this.notify(this.claimedListeners, event);

    return ok({ recipient: caller, amount });
  }

  /**
   * Replace the active root. Redemptions recorded under earlier roots stay.
   */
  async rotateRoot(caller: string, newRoot: Buffer): Promise<Result<void>> {
    if (!(await this.access.isAuthorityFor('setRoot', caller))) {
      return fail(new ClaimError('Unauthorized', `${caller} may not set the root`));
    }

    if (!Buffer.isBuffer(newRoot) || newRoot.length !== DIGEST_LENGTH) {
      return fail(new ClaimError('InvalidRequest', `Root must be ${DIGEST_LENGTH} bytes`));
    }

    const previous = await this.store.setRoot(newRoot);

    const event: RootRotated = {
      previousRoot: previous.toString('hex'),
      newRoot: newRoot.toString('hex'),
      rotatedBy: caller,
    };
    console.log(`[Ledger] Root rotated to ${event.newRoot} by ${caller}`);
    this.notify(this.rotatedListeners, event);

    return ok(undefined);
  }

  async currentRoot(): Promise<Buffer> {
    return this.store.getRoot();
  }

  async isClaimed(recipient: string): Promise<boolean> {
    return this.store.isClaimed(recipient);
  }

  onClaimed(listener: Listener<ClaimCompleted>): () => void {
    this.claimedListeners.add(listener);
    return () => this.claimedListeners.delete(listener);
  }

  onRootRotated(listener: Listener<RootRotated>): () => void {
    this.rotatedListeners.add(listener);
    return () => this.rotatedListeners.delete(listener);
  }

  /**
   * Resolves with null once the tokens moved, or with the unknown-outcome
   * error when they may have. Throws when they definitely did not.
   */
  private async transfer(to: string, amount: bigint): Promise<TransferOutcomeUnknownError | null> {
    let sent: boolean;
    try {
      sent = await this.tokens.transfer(to, amount);
    } catch (error) {
      if (error instanceof TransferOutcomeUnknownError) {
        return error;
      }
      throw new ClaimError('TransferFailed', `Transfer to ${to} failed`, { cause: error });
    }

    if (!sent) {
      throw new ClaimError('TransferFailed', `Transfer to ${to} was rejected`);
    }
    return null;
  }

  private notify<T>(listeners: Set<Listener<T>>, event: T): void {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[Ledger] Listener failed:', error);
      }
    }
  }
}
