// server/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

const schema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.string().default('8080'),
  HOST: z.string().default('0.0.0.0'),
  MONGO_URI: z.string().default('mongodb://127.0.0.1:27017'),
  MONGO_DB: z.string().default('coursebuilder'),
  JWT_SECRET: z.string().min(1).default('dev_secret'),
  REVIEW_WRITE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  REVIEW_MIN_COUNT_DEFAULT: z.coerce.number().int().nonnegative().default(2),
  REVIEW_MIN_COUNTS_JSON: z.string().optional(),
});

export type Env = z.infer<typeof schema>;

export const env: Env = schema.parse(process.env);
