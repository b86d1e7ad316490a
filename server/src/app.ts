import express from 'express';
import cors from 'cors';
import { composeDashboard, emptyDashboard } from '../../src/domain/dashboard.js';
import type { AggregationHooks } from '../../src/domain/types.js';
import type { ExpenseExtractor } from './ai.js';
import type { ExpenseRepository } from './repo.js';
import { EXPENSE_CATEGORIES, ExpenseInputSchema, readDescription } from './validation.js';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export interface AppDeps {
  repo: ExpenseRepository;
  extractor: ExpenseExtractor;
  clock: Clock;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const dashboardHooks: AggregationHooks = {
  onSkip: (skip) => {
    console.warn(`Dashboard skipped expense ${String(skip.id)} (${skip.stage}, ${skip.field}): ${skip.reason}`);
  },
  onError: (error, scope) => {
    console.warn(`Dashboard ${scope} degraded:`, error);
  },
};

export function createApp({ repo, extractor, clock }: AppDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'healthy' });
  });

  // GET /api/dashboard - Summary statistics over every stored expense
  app.get('/api/dashboard', (_req, res) => {
    try {
      const expenses = repo.list();
      res.json({
        categories: EXPENSE_CATEGORIES,
        dashboard: composeDashboard(expenses, clock.now(), dashboardHooks),
      });
    } catch (error) {
      console.error('Dashboard error:', error);
      res.json({
        categories: EXPENSE_CATEGORIES,
        dashboard: emptyDashboard(),
        error: errorMessage(error),
      });
    }
  });

  // POST /api/analyze-expense - Extract fields from free text and store the expense
  app.post('/api/analyze-expense', async (req, res) => {
    const check = readDescription(req.body);
    if (!check.ok) {
      res.status(400).json({ error: check.error });
      return;
    }

    try {
      const analysis = await extractor.analyze(check.description);
      const stored = repo.create({
        description: check.description,
        name: analysis.name,
        amount: analysis.amount,
        category: analysis.category,
        created_at: clock.now().toISOString(),
      });
      res.json({ success: true, analysis, data: stored });
    } catch (error) {
      console.error('Expense analysis error:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // GET /api/expenses - All expenses, newest first
  app.get('/api/expenses', (_req, res) => {
    try {
      res.json(repo.list());
    } catch (error) {
      console.error('Error fetching expenses:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // PUT /api/expense/:id - Replace name, amount, category and description
  app.put('/api/expense/:id', (req, res) => {
    const parsed = ExpenseInputSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid expense data' });
      return;
    }

    try {
      const updated = repo.update(req.params.id, parsed.data);
      if (!updated) {
        res.status(404).json({ error: 'Expense not found' });
        return;
      }
      res.json({ success: true, data: updated });
    } catch (error) {
      console.error('Error updating expense:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // DELETE /api/expense/:id
  app.delete('/api/expense/:id', (req, res) => {
    try {
      const deleted = repo.remove(req.params.id);
      if (!deleted) {
        res.status(404).json({ error: 'Expense not found' });
        return;
      }
      res.json({ success: true, data: deleted });
    } catch (error) {
      console.error('Error deleting expense:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return app;
}
