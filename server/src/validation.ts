/**
 * Request validation for the expense API.
 *
 * EXPENSE_CATEGORIES is the closed set enforced at write time. The dashboard
 * aggregates whatever category a stored row carries and never checks it
 * against this list.
 */
import { z } from 'zod';

export const EXPENSE_CATEGORIES = [
  'Food & Dining',
  'Transportation',
  'Shopping',
  'Bills & Utilities',
  'Entertainment',
] as const;

export const CategorySchema = z.enum(EXPENSE_CATEGORIES);

/** Body of PUT /api/expense/:id; every field is required */
export const ExpenseInputSchema = z.object({
  name: z.string().min(1),
  amount: z.number().positive(),
  category: CategorySchema,
  description: z.string(),
});

export type DescriptionCheck =
  | { ok: true; description: string }
  | { ok: false; error: 'Description is required' | 'Description cannot be empty' };

/** Body of POST /api/analyze-expense */
export function readDescription(body: unknown): DescriptionCheck {
  const parsed = z.object({ description: z.string() }).safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: 'Description is required' };
  }
  const description = parsed.data.description.trim();
  if (!description) {
    return { ok: false, error: 'Description cannot be empty' };
  }
  return { ok: true, description };
}
