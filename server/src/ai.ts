/**
 * Expense extraction through Gemini function calling.
 *
 * The model is given a single function, `analyze_expense`, and asked to call
 * it for the user's description. The call arguments are the extraction.
 */
import { z } from 'zod';
import { CategorySchema, EXPENSE_CATEGORIES } from './validation.js';

const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

export const AnalysisSchema = z.object({
  name: z.string().min(1),
  amount: z.coerce.number().finite().nonnegative(),
  category: CategorySchema,
});

export type ExpenseAnalysis = z.infer<typeof AnalysisSchema>;

export interface ExpenseExtractor {
  analyze(description: string): Promise<ExpenseAnalysis>;
}

export class ExtractionError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export const analyzeExpenseFunction = {
  name: 'analyze_expense',
  description: 'Analyzes an expense description to extract name, amount, and category.',
  parameters: {
    type: 'OBJECT',
    properties: {
      name: { type: 'STRING', description: 'A concise name for the expense' },
      amount: { type: 'NUMBER', description: 'The amount of the expense' },
      category: {
        type: 'STRING',
        enum: [...EXPENSE_CATEGORIES],
        description: 'The category of the expense',
      },
    },
    required: ['name', 'amount', 'category'],
  },
} as const;

const GenerateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  functionCall: z.object({ name: z.string(), args: z.unknown() }).optional(),
                }),
              )
              .default([]),
          })
          .optional(),
      }),
    )
    .default([]),
});

export interface GeminiOptions {
  apiKey: string | undefined;
  model: string;
  timeoutMs: number;
  /** Injected in tests */
  fetchImpl?: typeof fetch;
}

export function createGeminiExtractor(options: GeminiOptions): ExpenseExtractor {
  const doFetch = options.fetchImpl ?? fetch;

  return {
    async analyze(description) {
      if (!options.apiKey) {
        throw new ExtractionError('Missing Gemini API key');
      }

      const upstream = await doFetch(`${GEMINI_API_BASE}/models/${options.model}:generateContent`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          'x-goog-api-key': options.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: `Analyze this expense: ${description}` }] }],
          tools: [{ functionDeclarations: [analyzeExpenseFunction] }],
        }),
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      if (!upstream.ok) {
        const text = await upstream.text().catch(() => '');
        throw new ExtractionError(`Gemini request failed (${upstream.status}): ${text}`.trim(), upstream.status);
      }

      const data: unknown = await upstream.json().catch(() => null);
      const parsed = GenerateContentResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new ExtractionError('Unexpected Gemini response');
      }

      const call = parsed.data.candidates[0]?.content?.parts[0]?.functionCall;
      if (!call) {
        throw new ExtractionError('AI analysis failed');
      }

      const analysis = AnalysisSchema.safeParse(call.args);
      if (!analysis.success) {
        const message = analysis.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ExtractionError(`Invalid analysis from model: ${message}`);
      }
      return analysis.data;
    },
  };
}
