import express, { Express } from 'express';
import cors from 'cors';
import { Server } from 'http';

import { AuthorityRegistry } from '../access/authority';
import { AdminService } from '../claims/admin';
import { ClaimLedger } from '../claims/ledger';
import { ApiConfig } from '../config/service';
import { createAdminRouter } from './routes/admin';
import { createClaimsRouter } from './routes/claims';
import { createHealthRouter } from './routes/health';
import { errorHandler } from './middleware/error-handler';
import { createRateLimiter } from './middleware/rate-limit';

export interface ApiServices {
  ledger: ClaimLedger;
  authority: AuthorityRegistry;
  admin: AdminService;
  checkStore?: () => Promise<void>;
  now?: () => number;
}

export function createApp(services: ApiServices, config: ApiConfig): Express {
  const app = express();

  // Trust proxy (for nginx)
  app.set('trust proxy', 1);

  app.use(
    cors({
      origin: config.corsOrigin === '*' ? '*' : config.corsOrigin.split(',').map((o) => o.trim()),
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type'],
    })
  );

  app.use(express.json({ limit: '64kb' }));

  // Application-level rate limiting (backup to nginx)
  app.use(
    createRateLimiter({
      windowMs: config.rateLimitWindowMs,
      maxRequests: config.rateLimitMax,
      now: services.now,
    })
  );

  // Security headers
  app.use((_req, res, next) => {
    res.set('X-Content-Type-Options', 'nosniff');
    res.set('X-Frame-Options', 'DENY');
    next();
  });

  // Request logging
  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  const signatureOptions = {
    signatureMaxAgeSeconds: config.signatureMaxAgeSeconds,
    now: services.now,
  };

  app.use('/api/health', createHealthRouter(services.checkStore));
  app.use(
    '/api/claims',
    createClaimsRouter({ ledger: services.ledger, authority: services.authority, ...signatureOptions })
  );
  app.use('/api/admin', createAdminRouter({ admin: services.admin, ...signatureOptions }));

  app.get('/api', (_req, res) => {
    res.json({
      name: 'Merkle Claim Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/api/health',
        root: '/api/claims/root',
        claimStatus: '/api/claims/:wallet',
        claim: 'POST /api/claims',
        adminStatus: '/api/admin/status',
        setRoot: 'POST /api/admin/root',
        pause: 'POST /api/admin/pause',
        unpause: 'POST /api/admin/unpause',
        sweep: 'POST /api/admin/sweep',
        nominateAuthority: 'POST /api/admin/authority/nominate',
        acceptAuthority: 'POST /api/admin/authority/accept',
        cancelNomination: 'POST /api/admin/authority/cancel',
        grantRole: 'POST /api/admin/roles/grant',
        revokeRole: 'POST /api/admin/roles/revoke',
      },
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      error: 'Not found',
      code: 'NOT_FOUND',
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}

export function startServer(services: ApiServices, config: ApiConfig): Server {
  const app = createApp(services, config);

  return app.listen(config.port, () => {
    console.log('='.repeat(50));
    console.log(`[API] Merkle Claim Ledger API`);
    console.log(`[API] Listening on port ${config.port}`);
    console.log(`[API] CORS origin: ${config.corsOrigin}`);
    console.log(`[API] Started at: ${new Date().toISOString()}`);
    console.log('='.repeat(50));
  });
}
