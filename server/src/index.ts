import 'dotenv/config';
import { createApp, systemClock } from './app.js';
import { createGeminiExtractor } from './ai.js';
import { openDatabase } from './db.js';
import { getServerEnv } from './env.js';
import { createRetryingRepository, createSqliteExpenseRepository } from './repo.js';

const env = getServerEnv();
const db = openDatabase(env.DATABASE_PATH);

const app = createApp({
  repo: createRetryingRepository(createSqliteExpenseRepository(db), env.DB_MAX_RETRIES),
  extractor: createGeminiExtractor({
    apiKey: env.GEMINI_API_KEY,
    model: env.GEMINI_MODEL,
    timeoutMs: env.GEMINI_TIMEOUT_MS,
  }),
  clock: systemClock,
});

if (!env.GEMINI_API_KEY) {
  console.warn('GEMINI_API_KEY is not set; /api/analyze-expense will fail until it is');
}

app.listen(env.PORT, () => {
  console.log(`API server running on http://localhost:${env.PORT}`);
});

export default app;
