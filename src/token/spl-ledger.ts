// src/token/spl-ledger.ts
// SPL token transfers out of the distributor wallet

import {
  ComputeBudgetProgram,
  Keypair,
  PublicKey,
  SendTransactionError,
  Transaction,
  TransactionExpiredBlockheightExceededError,
} from '@solana/web3.js';
import {
  createAssociatedTokenAccountIdempotentInstruction,
  createTransferInstruction,
  getAssociatedTokenAddressSync,
} from '@solana/spl-token';
import bs58 from 'bs58';
import { AssetSweeper, TokenLedger, TransferOutcomeUnknownError } from '../claims/types';
import { FailoverConnection } from '../utils/rpc';

export interface SplTokenLedgerConfig {
  rpc: FailoverConnection;
  distributor: Keypair;
  mint: PublicKey;
  computeUnitPrice?: number; // micro-lamports
  /** Delay between status polls while settling an unconfirmed transfer */
  pollIntervalMs?: number;
}

interface SignedTransfer {
  wire: Buffer;
  signature: string;
  blockhash: string;
  lastValidBlockHeight: number;
}

type Settlement = 'confirmed' | 'rejected';

const DEFAULT_POLL_INTERVAL_MS = 2000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SplTokenLedger implements TokenLedger, AssetSweeper {
  constructor(private config: SplTokenLedgerConfig) {}

  /**
   * Send `amount` raw units of the claim mint to `to`
   */
  async transfer(to: string, amount: bigint): Promise<boolean> {
    return this.send(this.config.mint, new PublicKey(to), amount, 'transfer');
  }

  /**
   * Send `amount` raw units of another mint held by the distributor
   */
  async sweep(mint: string, to: string, amount: bigint): Promise<boolean> {
    return this.send(new PublicKey(mint), new PublicKey(to), amount, 'sweep');
  }

  /**
   * Build the transfer instructions: create the recipient's ATA if needed,
   * then move the tokens
   */
  buildTransaction(mint: PublicKey, recipient: PublicKey, amount: bigint): Transaction {
    const owner = this.config.distributor.publicKey;
    const sourceAta = getAssociatedTokenAddressSync(mint, owner, true);
    const recipientAta = getAssociatedTokenAddressSync(mint, recipient, true);

    const tx = new Transaction();

    if (this.config.computeUnitPrice) {
      tx.add(
        ComputeBudgetProgram.setComputeUnitPrice({
          microLamports: this.config.computeUnitPrice,
        })
      );
    }

    tx.add(
      createAssociatedTokenAccountIdempotentInstruction(owner, recipientAta, recipient, mint),
      createTransferInstruction(sourceAta, recipientAta, owner, amount)
    );
    tx.feePayer = owner;

    return tx;
  }

  /**
   * `true` once confirmed, `false` only when the tokens cannot have moved.
   * Throws TransferOutcomeUnknownError when neither can be established.
   */
  private async send(
    mint: PublicKey,
    recipient: PublicKey,
    amount: bigint,
    label: string
  ): Promise<boolean> {
    let signed: SignedTransfer;
    try {
      signed = await this.sign(this.buildTransaction(mint, recipient, amount));
    } catch (error) {
      console.error(`[Token] ${label} to ${recipient.toBase58()} not sent: ${errorMessage(error)}`);
      return false;
    }

    const settlement = await this.submit(signed, label);

    if (settlement === 'rejected') {
      console.error(`[Token] ${label} to ${recipient.toBase58()} rejected: ${signed.signature}`);
      return false;
    }

    console.log(`[Token] ${label} ${amount} of ${mint.toBase58()} to ${recipient.toBase58()}: ${signed.signature}`);
    return true;
  }

  /**
   * Sign once against a fixed blockhash. Every broadcast of this transfer
   * reuses these bytes, so the cluster can execute it at most once.
   */
  private async sign(tx: Transaction): Promise<SignedTransfer> {
    const { blockhash, lastValidBlockHeight } = await this.config.rpc.execute(
      (connection) => connection.getLatestBlockhash('confirmed'),
      'getLatestBlockhash'
    );
    tx.recentBlockhash = blockhash;
    tx.lastValidBlockHeight = lastValidBlockHeight;
    tx.sign(this.config.distributor);

    const raw = tx.signature;
    if (!raw) {
      throw new Error('Transaction is missing the distributor signature');
    }

    return { wire: tx.serialize(), signature: bs58.encode(raw), blockhash, lastValidBlockHeight };
  }

  private async submit(signed: SignedTransfer, label: string): Promise<Settlement> {
    const { wire, signature, blockhash, lastValidBlockHeight } = signed;
    let broadcast = false;

    try {
      const { value } = await this.config.rpc.execute(
        async (connection) => {
          try {
            await connection.sendRawTransaction(wire, { preflightCommitment: 'confirmed' });
          } catch (error) {
            if (!(error instanceof SendTransactionError)) broadcast = true;
            throw error;
          }
          broadcast = true;
          return connection.confirmTransaction({ signature, blockhash, lastValidBlockHeight }, 'confirmed');
        },
        label,
        (error) =>
          !(error instanceof SendTransactionError) &&
          !(error instanceof TransactionExpiredBlockheightExceededError)
      );
      return value.err ? 'rejected' : 'confirmed';
    } catch (error) {
      // Preflight refused the only copy that ever reached a node
      if (error instanceof SendTransactionError && !broadcast) {
        return 'rejected';
      }

      console.log(`[Token] ${label} ${signature} unconfirmed (${errorMessage(error)}), polling status`);
      return this.reconcile(signature, lastValidBlockHeight);
    }
  }

  /**
   * Poll until the transaction is confirmed or its blockhash has expired
   */
  private async reconcile(signature: string, lastValidBlockHeight: number): Promise<Settlement> {
    const { rpc } = this.config;
    const interval = this.config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

    try {
      for (;;) {
        // Height is read before status: past expiry, a later status read is final
        const height = await rpc.execute((connection) => connection.getBlockHeight('confirmed'), 'getBlockHeight');
        const { value } = await rpc.execute(
          (connection) => connection.getSignatureStatuses([signature], { searchTransactionHistory: true }),
          'getSignatureStatuses'
        );
        const status = value[0];

        if (status && (status.confirmationStatus === 'confirmed' || status.confirmationStatus === 'finalized')) {
          return status.err ? 'rejected' : 'confirmed';
        }
        if (!status && height > lastValidBlockHeight) {
          return 'rejected';
        }

        await sleep(interval);
      }
    } catch (error) {
      console.error(`[Token] Could not settle ${signature}: ${errorMessage(error)}`);
      throw new TransferOutcomeUnknownError(signature, { cause: error });
    }
  }
}
