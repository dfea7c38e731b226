import { Router, Request, Response, RequestHandler } from 'express';
import { Role, isRole } from '../../access/types';
import { AdminService } from '../../claims/admin';
import { Result } from '../../claims/types';
import { asyncHandler, createError, fromClaimError } from '../middleware/error-handler';
import { getCaller, requireSignature } from '../middleware/signature';
import { parseAmount, parseRoot, readBody, requireWallet } from '../validation';

export interface AdminRouterOptions {
  admin: AdminService;
  signatureMaxAgeSeconds: number;
  now?: () => number;
}

function unwrap(result: Result<void>): void {
  if (!result.ok) {
    throw fromClaimError(result.error);
  }
}

function parseRole(value: unknown): Role {
  if (!isRole(value)) {
    throw createError('role must be one of setRoot, pause, unpause, sweep', 400, 'INVALID_ROLE');
  }
  return value;
}

export function createAdminRouter(options: AdminRouterOptions): Router {
  const { admin } = options;
  const router = Router();

  const signed = (action: string, fields: readonly string[] = []): RequestHandler =>
    requireSignature(action, fields, options.signatureMaxAgeSeconds, options.now);

  /**
   * GET /api/admin/status
   */
  router.get(
    '/status',
    asyncHandler(async (_req: Request, res: Response) => {
      res.set('Cache-Control', 'no-store');
      res.json(await admin.status());
    })
  );

  /**
   * POST /api/admin/root
   * Rotate the Merkle root
   */
  router.post(
    '/root',
    signed('setRoot', ['root']),
    asyncHandler(async (req: Request, res: Response) => {
      const root = parseRoot(readBody(req).root);
      unwrap(await admin.setRoot(getCaller(res), root));
      res.json({ status: 'ok', root: root.toString('hex') });
    })
  );

  router.post(
    '/pause',
    signed('pause'),
    asyncHandler(async (_req: Request, res: Response) => {
      unwrap(await admin.pause(getCaller(res)));
      res.json({ status: 'ok', acceptingClaims: false });
    })
  );

  router.post(
    '/unpause',
    signed('unpause'),
    asyncHandler(async (_req: Request, res: Response) => {
      unwrap(await admin.unpause(getCaller(res)));
      res.json({ status: 'ok', acceptingClaims: true });
    })
  );

  /**
   * POST /api/admin/sweep
   * Recover a foreign token held by the distributor
   */
  router.post(
    '/sweep',
    signed('sweep', ['mint', 'to', 'amount']),
    asyncHandler(async (req: Request, res: Response) => {
      const body = readBody(req);
      const mint = requireWallet(body.mint, 'mint');
      const to = requireWallet(body.to, 'destination');
      const amount = parseAmount(body.amount);

      unwrap(await admin.sweepForeignAsset(getCaller(res), mint, to, amount));
      res.json({ status: 'ok', mint, to, amount: amount.toString() });
    })
  );

  router.post(
    '/authority/nominate',
    signed('nominateAuthority', ['nominee']),
    asyncHandler(async (req: Request, res: Response) => {
      const nominee = requireWallet(readBody(req).nominee, 'nominee');
      unwrap(await admin.nominateAuthority(getCaller(res), nominee));
      res.json({ status: 'ok', pendingAuthority: nominee });
    })
  );

  router.post(
    '/authority/accept',
    signed('acceptAuthority'),
    asyncHandler(async (_req: Request, res: Response) => {
      const caller = getCaller(res);
      unwrap(await admin.acceptAuthority(caller));
      res.json({ status: 'ok', authority: caller });
    })
  );

  router.post(
    '/authority/cancel',
    signed('cancelNomination'),
    asyncHandler(async (_req: Request, res: Response) => {
      unwrap(await admin.cancelNomination(getCaller(res)));
      res.json({ status: 'ok', pendingAuthority: null });
    })
  );

  router.post(
    '/roles/grant',
    signed('grantRole', ['role', 'grantee']),
    asyncHandler(async (req: Request, res: Response) => {
      const body = readBody(req);
      const role = parseRole(body.role);
      const grantee = requireWallet(body.grantee, 'grantee');

      unwrap(await admin.grantRole(getCaller(res), role, grantee));
      res.json({ status: 'ok', role, grantee });
    })
  );

  router.post(
    '/roles/revoke',
    signed('revokeRole', ['role', 'grantee']),
    asyncHandler(async (req: Request, res: Response) => {
      const body = readBody(req);
      const role = parseRole(body.role);
      const grantee = requireWallet(body.grantee, 'grantee');

      unwrap(await admin.revokeRole(getCaller(res), role, grantee));
      res.json({ status: 'ok', role, grantee });
    })
  );

  return router;
}
