// src/claims/types.ts
// Claim ledger types and collaborator interfaces

export type ClaimErrorKind =
  | 'InvalidProof'    // Proof does not rebuild the current root
  | 'AlreadyClaimed'  // Recipient already redeemed
  | 'ClaimsPaused'    // Operational mode disallows claims
  | 'Unauthorized'    // Caller lacks authority for the action
  | 'TransferFailed'  // Token ledger rejected the transfer
  | 'InvalidRequest'; // Malformed administrative input

export class ClaimError extends Error {
  readonly kind: ClaimErrorKind;

  constructor(kind: ClaimErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClaimError';
    this.kind = kind;
  }
}

export type Result<T, E = ClaimError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Raised by a token collaborator when a transfer was broadcast but whether
 * it landed could not be established. The caller must treat the tokens as
 * possibly sent.
 */
export class TransferOutcomeUnknownError extends Error {
  readonly signature: string;

  constructor(signature: string, options?: { cause?: unknown }) {
    super(`Outcome of transaction ${signature} is unknown`, options);
    this.name = 'TransferOutcomeUnknownError';
    this.signature = signature;
  }
}

/**
 * What the ledger hands to the token collaborator for a successful claim
 */
export interface TransferInstruction {
  recipient: string;
  amount: bigint;
}

/**
 * Privileged actions checked through AccessControl
 */
export const ADMIN_ACTIONS = [
  'setRoot',
  'pause',
  'unpause',
  'sweep',
  'grantRole',
  'revokeRole',
  'transferAuthority',
] as const;

export type AdminAction = (typeof ADMIN_ACTIONS)[number];

/**
 * Fungible token collaborator. `false` means the tokens definitely did not
 * move; an outcome that cannot be settled is thrown as
 * TransferOutcomeUnknownError.
 */
export interface TokenLedger {
  transfer(to: string, amount: bigint): Promise<boolean>;
}

/**
 * Recovery of assets other than the claim token
 */
export interface AssetSweeper {
  sweep(mint: string, to: string, amount: bigint): Promise<boolean>;
}

/**
 * Pause and capability checks consulted by every privileged operation
 */
export interface AccessControl {
  isAcceptingClaims(): Promise<boolean>;
  isAuthorityFor(action: AdminAction, caller: string): Promise<boolean>;
}

/**
 * View of one recipient's redemption state inside an exclusive section.
 * `root` is read once when the section opens.
 */
export interface RedemptionTransaction {
  readonly root: Buffer;
  isClaimed(): Promise<boolean>;
  markClaimed(amount: bigint): Promise<void>;
}

/**
 * Durable home of the root and the redemption record
 */
export interface ClaimStore {
  getRoot(): Promise<Buffer>;
  /** Replace the root and return the one it replaced, atomically */
  setRoot(root: Buffer): Promise<Buffer>;
  isClaimed(recipient: string): Promise<boolean>;
  /**
   * Run `work` exclusively for `recipient`. Writes made through the
   * transaction persist only if `work` resolves; a rejection rolls them back.
   */
  withRecipient<T>(recipient: string, work: (tx: RedemptionTransaction) => Promise<T>): Promise<T>;
}

export interface ClaimCompleted {
  recipient: string;
  amount: bigint;
  root: string;
}

export interface RootRotated {
  previousRoot: string;
  newRoot: string;
  rotatedBy: string;
}
