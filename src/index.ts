import 'dotenv/config';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { store } from './store';
import { createExpenseRepository } from './repository';
import { readExpenseDraft } from './validation';
import { nextClearState } from './confirmation';
import {
  categoryDistribution,
  cumulativeByDate,
  distinctCategories,
  filterByCategory,
  groupByCategory,
  groupByMonth,
  newestFirst,
  oldestFirst,
  summarize
} from './aggregator';
import { ApiError, ExpenseError, IndexedExpense } from './types';

const app = express();
const PORT = process.env.PORT || 3001;
const repository = createExpenseRepository(store);

// Middleware
app.use(cors());
app.use(express.json());

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
  next();
});

function toApiError(error: ExpenseError): ApiError {
  return { error: error.message, code: error.code, details: [error.message] };
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

// GET /expenses - List expenses with their load-order index
app.get('/expenses', (req: Request, res: Response) => {
  try {
    const category = queryString(req.query.category);
    const sort = queryString(req.query.sort);

    const expenses = repository.load();
    let data: IndexedExpense[];
    if (sort === 'insertion') {
      data = expenses.map((e, index) => ({ ...e, index }));
    } else if (sort === 'date_asc') {
      data = oldestFirst(expenses);
    } else {
      data = newestFirst(expenses);
    }
    if (category) {
      data = data.filter((e) => e.Category === category);
    }

    return res.json({ data, total: data.length });
  } catch (error) {
    console.error('Error fetching expenses:', error);
    const apiError: ApiError = { error: 'Failed to fetch expenses' };
    return res.status(500).json(apiError);
  }
});

// POST /expenses - Record a new expense
app.post('/expenses', (req: Request, res: Response) => {
  try {
    const parsed = readExpenseDraft(req.body);
    if (!parsed.valid) {
      const error: ApiError = { error: 'Validation failed', details: parsed.errors };
      return res.status(400).json(error);
    }

    const result = repository.add(parsed.draft);
    if (!result.ok) {
      return res.status(400).json(toApiError(result.error));
    }

    console.log(`Created expense at position ${result.index}`);
    return res.status(201).json({ index: result.index, expense: result.expense });
  } catch (error) {
    console.error('Error creating expense:', error);
    const apiError: ApiError = { error: 'Failed to create expense' };
    return res.status(500).json(apiError);
  }
});

// POST /expenses/clear - Two-step clear; the client sends back the `armed` flag it received
app.post('/expenses/clear', (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    const flags = body && typeof body === 'object' ? (body as Record<string, unknown>) : {};
    const state = nextClearState(flags.armed === true, flags.cancel === true ? 'cancel' : 'clear');

    if (state.dispatch) {
      repository.clearAll();
      console.log('Cleared all expenses');
    } else if (state.armed) {
      console.log('Clear-all armed');
    }

    return res.json({ armed: state.armed, cleared: state.dispatch });
  } catch (error) {
    console.error('Error clearing expenses:', error);
    const apiError: ApiError = { error: 'Failed to clear expenses' };
    return res.status(500).json(apiError);
  }
});

// DELETE /expenses/:index - Delete by load-order position
app.delete('/expenses/:index', (req: Request, res: Response) => {
  try {
    const { index } = req.params;
    if (!/^-?\d+$/.test(index)) {
      const error: ApiError = { error: 'Index must be an integer', code: 'IndexError' };
      return res.status(400).json(error);
    }

    const result = repository.deleteAt(Number(index));
    if (!result.ok) {
      return res.status(404).json(toApiError(result.error));
    }

    console.log(`Deleted expense at position ${index}`);
    return res.status(204).send();
  } catch (error) {
    console.error('Error deleting expense:', error);
    const apiError: ApiError = { error: 'Failed to delete expense' };
    return res.status(500).json(apiError);
  }
});

// GET /stats - Spending statistics
app.get('/stats', (req: Request, res: Response) => {
  try {
    const expenses = repository.load();
    const category = queryString(req.query.category);

    return res.json({
      summary: summarize(category ? filterByCategory(expenses, category) : expenses),
      categories: groupByCategory(expenses),
      monthly: groupByMonth(expenses),
      distribution: categoryDistribution(expenses)
    });
  } catch (error) {
    console.error('Error fetching stats:', error);
    const apiError: ApiError = { error: 'Failed to fetch statistics' };
    return res.status(500).json(apiError);
  }
});

// GET /stats/trend - Running total by date
app.get('/stats/trend', (_req: Request, res: Response) => {
  try {
    return res.json(cumulativeByDate(repository.load()));
  } catch (error) {
    console.error('Error fetching trend:', error);
    const apiError: ApiError = { error: 'Failed to fetch trend' };
    return res.status(500).json(apiError);
  }
});

// GET /categories - Categories present in the collection
app.get('/categories', (_req: Request, res: Response) => {
  try {
    return res.json(distinctCategories(repository.load()));
  } catch (error) {
    console.error('Error fetching categories:', error);
    const apiError: ApiError = { error: 'Failed to fetch categories' };
    return res.status(500).json(apiError);
  }
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  return res.json({ status: 'ok', store: store.inspect(), timestamp: new Date().toISOString() });
});

// 404 handler
app.use((_req: Request, res: Response) => {
  return res.status(404).json({ error: 'Not found' });
});

// Error handler
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  // express.json() marks an unparseable body with status 400
  if ('status' in err && err.status === 400) {
    const error: ApiError = { error: 'Request body must be valid JSON' };
    return res.status(400).json(error);
  }
  console.error('Unhandled error:', err);
  return res.status(500).json({ error: 'Internal server error' });
});

function start() {
  app.listen(PORT, () => {
    console.log(`Expense Recorder API running on http://localhost:${PORT}`);
    console.log('Available endpoints:');
    console.log('  GET    /expenses        - List expenses (query: category, sort)');
    console.log('  POST   /expenses        - Record a new expense');
    console.log('  DELETE /expenses/:index - Delete the expense at a position');
    console.log('  POST   /expenses/clear  - Clear all expenses (send twice to confirm)');
    console.log('  GET    /stats           - Totals, per-category and monthly statistics');
    console.log('  GET    /stats/trend     - Cumulative spend by date');
    console.log('  GET    /categories      - Categories in use');
    console.log('  GET    /health          - Health check');
  });
}

if (require.main === module) {
  start();
}

export default app;
