import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  Commitment,
  ComputeBudgetProgram,
  Connection,
  Keypair,
  PublicKey,
  RpcResponseAndContext,
  SignatureResult,
  SignatureStatus,
  Transaction,
  TransactionExpiredBlockheightExceededError,
} from '@solana/web3.js';
import {
  ASSOCIATED_TOKEN_PROGRAM_ID,
  TOKEN_PROGRAM_ID,
  getAssociatedTokenAddressSync,
} from '@solana/spl-token';
import { SplTokenLedger } from './spl-ledger';
import { TransferOutcomeUnknownError } from '../claims/types';
import { FailoverConnection } from '../utils/rpc';
import { makeWallet } from '../testing/fixtures';

const BLOCKHASH = new PublicKey(Buffer.alloc(32, 3)).toBase58();
const LAST_VALID_BLOCK_HEIGHT = 100;
const MINT = new PublicKey(Buffer.alloc(32, 7));

function confirmation(err: SignatureResult['err'] = null): RpcResponseAndContext<SignatureResult> {
  return { context: { slot: 1 }, value: { err } };
}

function landed(err: SignatureStatus['err'] = null): SignatureStatus {
  return { slot: 5, confirmations: null, err, confirmationStatus: 'finalized' };
}

/**
 * Cluster stand-in: records every broadcast and answers from scripted handlers
 */
class StubCluster {
  sent: string[] = [];
  confirm: () => Promise<RpcResponseAndContext<SignatureResult>> = async () => confirmation();
  blockHeight: () => Promise<number> = async () => 50;
  statuses: Array<SignatureStatus | null> = [null];
  statusCalls = 0;
  blockhashFails = false;

  connect(url: string, commitment: Commitment): Connection {
    const connection = new Connection(url, commitment);

    connection.getLatestBlockhash = async () => {
      if (this.blockhashFails) throw new Error('blockhash unavailable');
      return { blockhash: BLOCKHASH, lastValidBlockHeight: LAST_VALID_BLOCK_HEIGHT };
    };
    connection.sendRawTransaction = async (raw) => {
      this.sent.push(Buffer.from(raw).toString('base64'));
      return 'ignored';
    };
    connection.confirmTransaction = () => this.confirm();
    connection.getBlockHeight = () => this.blockHeight();
    connection.getSignatureStatuses = async () => {
      const status = this.statuses[Math.min(this.statusCalls, this.statuses.length - 1)] ?? null;
      this.statusCalls++;
      return { context: { slot: 1 }, value: [status] };
    };

    return connection;
  }
}

function setup(cluster: StubCluster) {
  const rpc = new FailoverConnection(
    { primaryUrl: 'http://127.0.0.1:18899', maxRetries: 3, retryDelayMs: 0 },
    (url, commitment) => cluster.connect(url, commitment)
  );
  const distributor = Keypair.generate();
  const ledger = new SplTokenLedger({
    rpc,
    distributor,
    mint: MINT,
    computeUnitPrice: 500,
    pollIntervalMs: 0,
  });
  return { ledger, distributor };
}

function decode(wire: string): Transaction {
  return Transaction.from(Buffer.from(wire, 'base64'));
}

describe('SplTokenLedger transaction layout', () => {
  it('sends one signed transaction: priority fee, idempotent ATA create, transfer', async () => {
    const cluster = new StubCluster();
    const { ledger, distributor } = setup(cluster);
    const recipient = new PublicKey(makeWallet().wallet);

    assert.equal(await ledger.transfer(recipient.toBase58(), 10n), true);
    assert.equal(cluster.sent.length, 1);

    const tx = decode(cluster.sent[0]);
    assert.equal(tx.verifySignatures(), true);
    assert.equal(tx.recentBlockhash, BLOCKHASH);
    assert.ok(tx.feePayer?.equals(distributor.publicKey));

    const [budget, createAta, transfer] = tx.instructions;
    assert.equal(tx.instructions.length, 3);
    assert.ok(budget.programId.equals(ComputeBudgetProgram.programId));

    const recipientAta = getAssociatedTokenAddressSync(MINT, recipient, true);
    assert.ok(createAta.programId.equals(ASSOCIATED_TOKEN_PROGRAM_ID));
    assert.deepEqual([...createAta.data], [1]);
    assert.ok(createAta.keys[1].pubkey.equals(recipientAta));

    assert.ok(transfer.programId.equals(TOKEN_PROGRAM_ID));
    assert.equal(transfer.data[0], 3);
    assert.equal(transfer.data.readBigUInt64LE(1), 10n);
    assert.ok(transfer.keys[0].pubkey.equals(getAssociatedTokenAddressSync(MINT, distributor.publicKey, true)));
    assert.ok(transfer.keys[1].pubkey.equals(recipientAta));
  });

  it('returns false without broadcasting when no blockhash is available', async () => {
    const cluster = new StubCluster();
    cluster.blockhashFails = true;
    const { ledger } = setup(cluster);

    assert.equal(await ledger.transfer(makeWallet().wallet, 10n), false);
    assert.equal(cluster.sent.length, 0);
  });
});

describe('SplTokenLedger settlement', () => {
  it('returns false when the cluster executes and rejects the transfer', async () => {
    const cluster = new StubCluster();
    cluster.confirm = async () => confirmation({ InstructionError: [2, { Custom: 1 }] });
    const { ledger } = setup(cluster);

    assert.equal(await ledger.transfer(makeWallet().wallet, 10n), false);
    assert.equal(cluster.sent.length, 1);
  });

  it('rebroadcasts the same signed bytes after a network failure', async () => {
    const cluster = new StubCluster();
    let confirmCalls = 0;
    cluster.confirm = async () => {
      confirmCalls++;
      if (confirmCalls === 1) throw new Error('fetch failed');
      return confirmation();
    };
    const { ledger } = setup(cluster);

    assert.equal(await ledger.transfer(makeWallet().wallet, 10n), true);
    assert.equal(cluster.sent.length, 2);
    assert.equal(new Set(cluster.sent).size, 1);
  });

  it('reports a transfer that landed while confirmation kept failing', async () => {
    const cluster = new StubCluster();
    cluster.confirm = async () => {
      throw new Error('fetch failed');
    };
    cluster.statuses = [null, landed()];
    const { ledger } = setup(cluster);

    assert.equal(await ledger.transfer(makeWallet().wallet, 10n), true);
    assert.equal(cluster.statusCalls, 2);
    assert.equal(new Set(cluster.sent).size, 1);
  });

  it('returns false once the blockhash expired with no trace of the transfer', async () => {
    const cluster = new StubCluster();
    cluster.confirm = async () => {
      throw new TransactionExpiredBlockheightExceededError('expired');
    };
    cluster.blockHeight = async () => LAST_VALID_BLOCK_HEIGHT + 1;
    const { ledger } = setup(cluster);

    assert.equal(await ledger.transfer(makeWallet().wallet, 10n), false);
    assert.equal(cluster.sent.length, 1);
    assert.equal(cluster.statusCalls, 1);
  });

  it('keeps polling a transfer seen only at processed level', async () => {
    const cluster = new StubCluster();
    cluster.confirm = async () => {
      throw new TransactionExpiredBlockheightExceededError('expired');
    };
    cluster.blockHeight = async () => LAST_VALID_BLOCK_HEIGHT + 1;
    cluster.statuses = [
      { slot: 5, confirmations: 0, err: null, confirmationStatus: 'processed' },
      landed(),
    ];
    const { ledger } = setup(cluster);

    assert.equal(await ledger.transfer(makeWallet().wallet, 10n), true);
    assert.equal(cluster.statusCalls, 2);
  });

  it('throws an unknown outcome when the cluster cannot be reached to settle', async () => {
    const cluster = new StubCluster();
    cluster.confirm = async () => {
      throw new Error('fetch failed');
    };
    cluster.blockHeight = async () => {
      throw new Error('fetch failed');
    };
    const { ledger } = setup(cluster);

    await assert.rejects(ledger.transfer(makeWallet().wallet, 10n), TransferOutcomeUnknownError);
    assert.ok(cluster.sent.length > 0);
    assert.equal(new Set(cluster.sent).size, 1);
  });
});
