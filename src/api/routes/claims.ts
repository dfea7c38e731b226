import { Router, Request, Response } from 'express';
import { AuthorityRegistry } from '../../access/authority';
import { ClaimLedger } from '../../claims/ledger';
import { asyncHandler, fromClaimError } from '../middleware/error-handler';
import { getCaller, requireSignature } from '../middleware/signature';
import { parseAmount, parseProof, readBody, requireWallet } from '../validation';

export interface ClaimsRouterOptions {
  ledger: ClaimLedger;
  authority: AuthorityRegistry;
  signatureMaxAgeSeconds: number;
  now?: () => number;
}

export function createClaimsRouter(options: ClaimsRouterOptions): Router {
  const { ledger, authority } = options;
  const router = Router();

  /**
   * GET /api/claims/root
   * Current root and whether claims are open
   */
  router.get(
    '/root',
    asyncHandler(async (_req: Request, res: Response) => {
      const [root, accepting] = await Promise.all([
        ledger.currentRoot(),
        authority.isAcceptingClaims(),
      ]);

      res.set('Cache-Control', 'no-store');
      res.json({ root: root.toString('hex'), acceptingClaims: accepting });
    })
  );

  /**
   * GET /api/claims/:wallet
   * Redemption status for a wallet
   */
  router.get(
    '/:wallet',
    asyncHandler(async (req: Request, res: Response) => {
      const wallet = requireWallet(req.params.wallet, 'wallet');
      const claimed = await ledger.isClaimed(wallet);

      res.set('Cache-Control', 'no-store');
      res.json({ wallet, claimed });
    })
  );

  /**
   * POST /api/claims
   * Redeem the signing wallet's entitlement
   */
  router.post(
    '/',
    requireSignature('claim', ['amount', 'proof'], options.signatureMaxAgeSeconds, options.now),
    asyncHandler(async (req: Request, res: Response) => {
      const caller = getCaller(res);
      const body = readBody(req);
      const amount = parseAmount(body.amount);
      const proof = parseProof(body.proof);

      const result = await ledger.claim(caller, amount, proof);
      if (!result.ok) {
        throw fromClaimError(result.error);
      }

      res.json({
        status: 'claimed',
        recipient: result.value.recipient,
        amount: result.value.amount.toString(),
      });
    })
  );

  return router;
}
