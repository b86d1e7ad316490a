/**
 * Minimal API smoke test script
 * Run with: npm run smoke (requires the API server running; SMOKE_API_BASE overrides the address)
 *
 * The analyze step needs a working GEMINI_API_KEY on the server. Without one
 * it fails, and so do the update and delete checks that use its row.
 */
import { z } from 'zod';

const API_BASE = process.env.SMOKE_API_BASE ?? 'http://localhost:8787';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson<T>(schema: z.ZodType<T>, url: string, options?: RequestInit): Promise<T> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected response (${response.status}): ${JSON.stringify(body)}`);
  }
  return parsed.data;
}

const ExpenseSchema = z.object({
  id: z.string(),
  name: z.string(),
  amount: z.number(),
  category: z.string(),
  created_at: z.string(),
});

const MutationSchema = z.object({ success: z.literal(true), data: ExpenseSchema });

async function runTests(): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');

  // Test 1: Health check
  await test('GET /api/health returns healthy', async () => {
    await fetchJson(z.object({ status: z.literal('healthy') }), `${API_BASE}/api/health`);
  });

  // Test 2: GET /api/expenses returns array
  await test('GET /api/expenses returns array', async () => {
    await fetchJson(z.array(ExpenseSchema), `${API_BASE}/api/expenses`);
  });

  // Test 3: Validation
  await test('POST /api/analyze-expense rejects blank description', async () => {
    await fetchJson(z.object({ error: z.literal('Description cannot be empty') }), `${API_BASE}/api/analyze-expense`, {
      method: 'POST',
      body: JSON.stringify({ description: '   ' }),
    });
  });

  // Test 4: Analyze + store
  let createdId: string | null = null;

  await test('POST /api/analyze-expense creates expense', async () => {
    const result = await fetchJson(MutationSchema, `${API_BASE}/api/analyze-expense`, {
      method: 'POST',
      body: JSON.stringify({ description: `smoke-test coffee 3.50 ${Date.now()}` }),
    });
    createdId = result.data.id;
  });

  // Test 5: PUT
  await test('PUT /api/expense/:id updates expense', async () => {
    if (!createdId) throw new Error('No expense to update');

    const result = await fetchJson(MutationSchema, `${API_BASE}/api/expense/${createdId}`, {
      method: 'PUT',
      body: JSON.stringify({ name: 'Smoke coffee', amount: 3.5, category: 'Food & Dining', description: 'smoke-test' }),
    });
    if (result.data.name !== 'Smoke coffee') {
      throw new Error(`Expected name 'Smoke coffee', got '${result.data.name}'`);
    }
  });

  // Test 6: DELETE
  await test('DELETE /api/expense/:id removes expense', async () => {
    if (!createdId) throw new Error('No expense to delete');
    await fetchJson(MutationSchema, `${API_BASE}/api/expense/${createdId}`, { method: 'DELETE' });
  });

  // Test 7: Dashboard shape
  await test('GET /api/dashboard returns a full summary', async () => {
    const series = z.object({ total: z.array(z.tuple([z.string(), z.number()])), by_category: z.record(z.unknown()) });
    await fetchJson(
      z.object({
        categories: z.array(z.string()).length(5),
        dashboard: z.object({
          total: z.number(),
          category_totals: z.record(z.number()),
          top_categories: z.array(z.tuple([z.string(), z.number()])).max(5),
          time_series: z.object({ daily: series, weekly: series, monthly: series }),
          recent_expenses: z.array(ExpenseSchema).max(5),
          avg_daily_expense: z.number(),
          current_month_total: z.number(),
          mom_growth: z.number(),
        }),
      }),
      `${API_BASE}/api/dashboard`,
    );
  });

  // Summary
  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

// Check if API is reachable before running tests
async function checkApiReachable(): Promise<boolean> {
  try {
    const response = await fetch(`${API_BASE}/api/health`);
    return response.ok;
  } catch {
    return false;
  }
}

async function main(): Promise<void> {
  console.log('Checking if API server is running...');

  const reachable = await checkApiReachable();
  if (!reachable) {
    console.error(`\nError: API server not reachable at ${API_BASE}`);
    console.error('Please start the server with: npm run dev\n');
    process.exit(1);
  }

  await runTests();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
