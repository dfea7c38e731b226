import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ClaimCompleted,
  ClaimErrorKind,
  Result,
  RootRotated,
  TransferInstruction,
  TransferOutcomeUnknownError,
} from './types';
import { buildTree, createTestContext, makeWallet } from '../testing/fixtures';
import { ZERO_ROOT } from '../merkle/types';

function errorKind<T>(result: Result<T>): ClaimErrorKind | null {
  return result.ok ? null : result.error.kind;
}

function fourEntitlements() {
  const [a, b, c, d] = [makeWallet(), makeWallet(), makeWallet(), makeWallet()];
  const entries = [
    { wallet: a.wallet, amount: 10n },
    { wallet: b.wallet, amount: 20n },
    { wallet: c.wallet, amount: 30n },
    { wallet: d.wallet, amount: 40n },
  ];
  const tree = buildTree(entries);
  return { a, b, c, d, entries, tree };
}

describe('ClaimLedger scenario: four entitlements', () => {
  it('pays B once, then rejects the repeat and the wrong amount', async () => {
    const { b, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    const proofB = tree.getProof(1);

    assert.equal(proofB.length, 2);

    const first = await ctx.ledger.claim(b.wallet, 20n, proofB);
    assert.deepEqual(first, { ok: true, value: { recipient: b.wallet, amount: 20n } });
    assert.deepEqual(ctx.tokens.transfers, [{ recipient: b.wallet, amount: 20n }]);

    const repeat = await ctx.ledger.claim(b.wallet, 20n, proofB);
    assert.equal(errorKind(repeat), 'AlreadyClaimed');

    const wrongAmount = await ctx.ledger.claim(b.wallet, 21n, proofB);
    assert.equal(errorKind(wrongAmount), 'InvalidProof');

    assert.equal(ctx.tokens.transfers.length, 1);
  });
});

describe('ClaimLedger at-most-once', () => {
  it('lets every recipient claim exactly once', async () => {
    const { entries, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());

    for (const [i, entry] of entries.entries()) {
      const proof = tree.getProof(i);
      assert.equal((await ctx.ledger.claim(entry.wallet, entry.amount, proof)).ok, true);
      assert.equal(errorKind(await ctx.ledger.claim(entry.wallet, entry.amount, proof)), 'AlreadyClaimed');
    }

    const expected: TransferInstruction[] = entries.map((e) => ({ recipient: e.wallet, amount: e.amount }));
    assert.deepEqual(ctx.tokens.transfers, expected);
  });

  it('serialises concurrent claims for the same recipient', async () => {
    const { c, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    ctx.tokens.delayMs = 10;

    const results = await Promise.all([
      ctx.ledger.claim(c.wallet, 30n, tree.getProof(2)),
      ctx.ledger.claim(c.wallet, 30n, tree.getProof(2)),
      ctx.ledger.claim(c.wallet, 30n, tree.getProof(2)),
    ]);

    assert.deepEqual(results.map(errorKind), [null, 'AlreadyClaimed', 'AlreadyClaimed']);
    assert.equal(ctx.tokens.transfers.length, 1);
  });

  it('does not let another wallet use someone else\'s proof', async () => {
    const { tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    const thief = makeWallet();

    assert.equal(errorKind(await ctx.ledger.claim(thief.wallet, 20n, tree.getProof(1))), 'InvalidProof');
    assert.equal(ctx.tokens.transfers.length, 0);
  });
});

describe('ClaimLedger transfer atomicity', () => {
  for (const mode of ['reject', 'throw'] as const) {
    it(`rolls back the redemption when the transfer ${mode}s`, async () => {
      const { a, tree } = fourEntitlements();
      const ctx = createTestContext(tree.getRoot());
      const proofA = tree.getProof(0);

      ctx.tokens.mode = mode;
      const failed = await ctx.ledger.claim(a.wallet, 10n, proofA);
      assert.equal(errorKind(failed), 'TransferFailed');
      assert.equal(await ctx.ledger.isClaimed(a.wallet), false);
      assert.equal(ctx.store.getRedemption(a.wallet), undefined);

      ctx.tokens.mode = 'ok';
      assert.equal((await ctx.ledger.claim(a.wallet, 10n, proofA)).ok, true);
      assert.equal(errorKind(await ctx.ledger.claim(a.wallet, 10n, proofA)), 'AlreadyClaimed');
      assert.deepEqual(ctx.tokens.transfers, [{ recipient: a.wallet, amount: 10n }]);
    });
  }

  it('keeps the underlying transfer error as the cause', async () => {
    const { a, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    ctx.tokens.mode = 'throw';

    const result = await ctx.ledger.claim(a.wallet, 10n, tree.getProof(0));
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error.cause instanceof Error);
      assert.equal(result.error.cause.message, 'rpc unavailable');
    }
  });
});

describe('ClaimLedger unsettled transfers', () => {
  it('holds the redemption when the transfer may have landed', async () => {
    const { c, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    const events: ClaimCompleted[] = [];
    ctx.ledger.onClaimed((event) => events.push(event));

    ctx.tokens.mode = 'unknown';
    const unsettled = await ctx.ledger.claim(c.wallet, 30n, tree.getProof(2));

    assert.equal(errorKind(unsettled), 'TransferFailed');
    if (!unsettled.ok) {
      assert.ok(unsettled.error.cause instanceof TransferOutcomeUnknownError);
      assert.equal(unsettled.error.cause.signature, 'test-signature');
    }
    assert.equal(await ctx.ledger.isClaimed(c.wallet), true);
    assert.equal(events.length, 0);

    ctx.tokens.mode = 'ok';
    assert.equal(errorKind(await ctx.ledger.claim(c.wallet, 30n, tree.getProof(2))), 'AlreadyClaimed');
    assert.equal(ctx.tokens.transfers.length, 0);
  });
});

describe('ClaimLedger pause gating', () => {
  it('rejects every claim while paused without touching state', async () => {
    const { d, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());

    assert.equal((await ctx.authority.pause(ctx.authorityWallet.wallet)).ok, true);

    assert.equal(errorKind(await ctx.ledger.claim(d.wallet, 40n, tree.getProof(3))), 'ClaimsPaused');
    assert.equal(errorKind(await ctx.ledger.claim(d.wallet, 41n, [])), 'ClaimsPaused');
    assert.equal(await ctx.ledger.isClaimed(d.wallet), false);
    assert.equal(ctx.tokens.transfers.length, 0);

    assert.equal((await ctx.authority.unpause(ctx.authorityWallet.wallet)).ok, true);
    assert.equal((await ctx.ledger.claim(d.wallet, 40n, tree.getProof(3))).ok, true);
  });
});

describe('ClaimLedger root rotation', () => {
  it('keeps redemptions and invalidates old proofs', async () => {
    const { a, b, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    const admin = ctx.authorityWallet.wallet;

    assert.equal((await ctx.ledger.claim(a.wallet, 10n, tree.getProof(0))).ok, true);

    const e = makeWallet();
    const next = buildTree([
      { wallet: a.wallet, amount: 10n },
      { wallet: e.wallet, amount: 50n },
    ]);
    assert.deepEqual(await ctx.ledger.rotateRoot(admin, next.getRoot()), { ok: true, value: undefined });
    assert.ok((await ctx.ledger.currentRoot()).equals(next.getRoot()));

    assert.equal(await ctx.ledger.isClaimed(a.wallet), true);
    assert.equal(errorKind(await ctx.ledger.claim(a.wallet, 10n, next.getProof(0))), 'AlreadyClaimed');
    assert.equal(errorKind(await ctx.ledger.claim(b.wallet, 20n, tree.getProof(1))), 'InvalidProof');
    assert.equal((await ctx.ledger.claim(e.wallet, 50n, next.getProof(1))).ok, true);
  });

  it('reports a consistent previous root for concurrent rotations', async () => {
    const ctx = createTestContext();
    const admin = ctx.authorityWallet.wallet;
    const events: RootRotated[] = [];
    ctx.ledger.onRootRotated((event) => events.push(event));

    await Promise.all([
      ctx.ledger.rotateRoot(admin, Buffer.alloc(32, 1)),
      ctx.ledger.rotateRoot(admin, Buffer.alloc(32, 2)),
    ]);

    assert.equal(events.length, 2);
    const first = events.find((e) => e.previousRoot === '00'.repeat(32));
    const second = events.find((e) => e !== first);
    assert.ok(first);
    assert.ok(second);
    assert.equal(second.previousRoot, first.newRoot);
    assert.equal((await ctx.ledger.currentRoot()).toString('hex'), second.newRoot);
  });

  it('requires authority', async () => {
    const { tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());

    const result = await ctx.ledger.rotateRoot(makeWallet().wallet, Buffer.alloc(32, 1));
    assert.equal(errorKind(result), 'Unauthorized');
    assert.ok((await ctx.ledger.currentRoot()).equals(tree.getRoot()));
  });

  it('rejects roots that are not 32 bytes', async () => {
    const ctx = createTestContext();
    const result = await ctx.ledger.rotateRoot(ctx.authorityWallet.wallet, Buffer.alloc(31));
    assert.equal(errorKind(result), 'InvalidRequest');
  });

  it('starts from the zero root, which nothing verifies against', async () => {
    const ctx = createTestContext();
    assert.ok((await ctx.ledger.currentRoot()).equals(ZERO_ROOT));
    assert.equal(errorKind(await ctx.ledger.claim(makeWallet().wallet, 1n, [])), 'InvalidProof');
  });
});

describe('ClaimLedger input handling', () => {
  it('accepts an empty proof for a single-entry tree', async () => {
    const solo = makeWallet();
    const tree = buildTree([{ wallet: solo.wallet, amount: 5n }]);
    const ctx = createTestContext(tree.getRoot());

    assert.equal((await ctx.ledger.claim(solo.wallet, 5n, [])).ok, true);
  });

  it('degrades malformed input to InvalidProof', async () => {
    const { a, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());

    assert.equal(errorKind(await ctx.ledger.claim('not-a-wallet', 10n, tree.getProof(0))), 'InvalidProof');
    assert.equal(errorKind(await ctx.ledger.claim(a.wallet, 0n, tree.getProof(0))), 'InvalidProof');
    assert.equal(errorKind(await ctx.ledger.claim(a.wallet, 10n, [Buffer.alloc(5)])), 'InvalidProof');
  });

  it('rejects proofs deeper than the configured limit', async () => {
    const wallets = Array.from({ length: 8 }, () => makeWallet());
    const tree = buildTree(wallets.map((w, i) => ({ wallet: w.wallet, amount: BigInt(i + 1) })));
    const ctx = createTestContext(tree.getRoot(), 2);

    assert.equal(errorKind(await ctx.ledger.claim(wallets[0].wallet, 1n, tree.getProof(0))), 'InvalidProof');
  });
});

describe('ClaimLedger notifications', () => {
  it('announces a claim only after it commits', async () => {
    const { b, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    const events: ClaimCompleted[] = [];
    const committedAtEvent: boolean[] = [];

    ctx.ledger.onClaimed((event) => {
      events.push(event);
      committedAtEvent.push(ctx.store.getRedemption(event.recipient) !== undefined);
    });

    ctx.tokens.mode = 'reject';
    await ctx.ledger.claim(b.wallet, 20n, tree.getProof(1));
    assert.equal(events.length, 0);

    ctx.tokens.mode = 'ok';
    await ctx.ledger.claim(b.wallet, 20n, tree.getProof(1));

    assert.deepEqual(events, [{ recipient: b.wallet, amount: 20n, root: tree.getRootHex() }]);
    assert.deepEqual(committedAtEvent, [true]);
  });

  it('announces root rotations and supports unsubscribing', async () => {
    const ctx = createTestContext();
    const admin = ctx.authorityWallet.wallet;
    const events: RootRotated[] = [];
    const unsubscribe = ctx.ledger.onRootRotated((event) => events.push(event));

    await ctx.ledger.rotateRoot(admin, Buffer.alloc(32, 1));
    unsubscribe();
    await ctx.ledger.rotateRoot(admin, Buffer.alloc(32, 2));

    assert.deepEqual(events, [
      { previousRoot: '00'.repeat(32), newRoot: '01'.repeat(32), rotatedBy: admin },
    ]);
  });

  it('survives a throwing listener', async () => {
    const { a, tree } = fourEntitlements();
    const ctx = createTestContext(tree.getRoot());
    ctx.ledger.onClaimed(() => {
      throw new Error('listener bug');
    });

    assert.equal((await ctx.ledger.claim(a.wallet, 10n, tree.getProof(0))).ok, true);
  });
});
