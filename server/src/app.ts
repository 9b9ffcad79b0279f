import express, { type Express } from 'express';
import cors from 'cors';
import { createAuthService } from './auth.js';
import type { Config } from './config.js';
import { createFinanceService } from './finance.js';
import { errorHandler, notFound, requestLogger, requireUser } from './http.js';
import type { Repository } from './repo.js';
import { authRouter } from './routes/auth.js';
import { financeRouter } from './routes/finance.js';

export interface AppDeps {
  config: Config;
  repo: Repository;
  /** Clock used for sessions, default dates and "current month" */
  now?: () => Date;
}

export function createApp({ config, repo, now = () => new Date() }: AppDeps): Express {
  const app = express();
  const auth = createAuthService(repo, { sessionLifetimeSecs: config.sessionLifetimeSecs, now });
  const finance = createFinanceService(repo, { now });

  app.use(cors());
  app.use(express.json());
  if (config.logRequests) {
    app.use(requestLogger());
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/auth', authRouter(auth, repo, now));
  app.use('/finance', requireUser(repo, now), financeRouter({
    repo,
    finance,
    now,
    pageSize: config.pageSize,
    currency: config.currencySymbol,
  }));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
