import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { createToken, isTokenValid } from './api/auth/auth';
import { getBreakdown } from './api/breakdown/breakdown';
import { getCategoryTotals } from './api/categories/totals';
import { importCsv } from './api/import/import';
import { getPaymentSummary, getPaymentSummaryCsv } from './api/payments/payments';
import { addProjection, applyGoal, getProjections, removeProjections } from './api/projections/projections';
import {
  addTransaction,
  getPersonalizedTransactions,
  getTransactions,
  removeTransaction,
} from './api/transactions/transactions';
import { getWeeklyBreakdown } from './api/weekly/weekly';
import { checkWorkspace, getCache, getWorkspace, updateCache } from './api/workspace/workspace';
import type { BudgetConfig } from './utils/config/config';
import { err } from './utils/log';
import { ApiError } from './utils/net/errors';

declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}

type Handler<T> = (request: Request, config: BudgetConfig) => T;

/**
 * Answers a failed request with `{ error }` and the ApiError's status, or 500 for anything else.
 */
export function sendError(res: Response, error: unknown) {
  const statusCode = error instanceof ApiError ? error.statusCode : 500;
  if (statusCode >= 500) {
    err('Request failed', { error: error instanceof Error ? error.message : String(error) });
  }
  res.status(statusCode).json({ error: error instanceof Error ? error.message : 'Unknown error' });
}

/**
 * Builds the Express application for one configuration. Listening is left to the caller.
 */
export function createApp(config: BudgetConfig): Express {
  const app: Express = express();

  // Middleware
  app.use(express.json());
  app.use(express.text({ type: ['text/csv', 'text/plain'], limit: '5mb' }));
  app.use(bodyParser.urlencoded({ extended: true }));

  const verifyToken = (req: Request, res: Response, next: NextFunction) => {
    const userId = isTokenValid(req.headers.authorization, config.jwtSecret);
    if (!userId) {
      res.status(401).json({ message: 'Invalid token' });
      return;
    }
    req.userId = userId;
    next();
  };

  const json =
    <T>(handler: Handler<T>) =>
    (req: Request, res: Response) => {
      try {
        res.json(handler(req, config));
      } catch (error) {
        sendError(res, error);
      }
    };

  // Auth routes
  app.post('/api/auth/token', async (req: Request, res: Response) => {
    try {
      res.json(await createToken(req, config));
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get('/api/auth/validate', (req: Request, res: Response) => {
    const userId = isTokenValid(req.headers.authorization, config.jwtSecret);
    if (!userId) {
      res.status(401).json({ message: 'Invalid token' });
      return;
    }
    res.json({ token: userId });
  });

  // Transaction routes
  app
    .route('/api/transactions')
    .get(verifyToken, json(getTransactions))
    .put(verifyToken, json(addTransaction));
  app.get('/api/transactions/personalized', verifyToken, json(getPersonalizedTransactions));
  app.delete('/api/transactions/:index', verifyToken, json(removeTransaction));

  // Breakdown routes
  app.get('/api/categories/totals', verifyToken, json(getCategoryTotals));
  app.get('/api/breakdown', verifyToken, json(getBreakdown));
  app.get('/api/weekly', verifyToken, json(getWeeklyBreakdown));

  // Projection routes
  app
    .route('/api/projections')
    .get(verifyToken, json(getProjections))
    .put(verifyToken, json(addProjection))
    .delete(verifyToken, json(removeProjections));
  app.post('/api/projections/goal', verifyToken, json(applyGoal));

  // Payment routes
  app.get('/api/payments/summary', verifyToken, json(getPaymentSummary));
  app.get('/api/payments/summary.csv', verifyToken, (req: Request, res: Response) => {
    try {
      res.type('text/csv').attachment('payment-summary.csv').send(getPaymentSummaryCsv(req, config));
    } catch (error) {
      sendError(res, error);
    }
  });

  // Import and workspace routes
  app.post('/api/import', verifyToken, json(importCsv));
  app.get('/api/workspace', verifyToken, json(getWorkspace));
  app.post('/api/workspace/check', verifyToken, json(checkWorkspace));
  app.route('/api/workspace/cache').get(verifyToken, json(getCache)).post(verifyToken, json(updateCache));

  return app;
}
