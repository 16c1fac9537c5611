import { z } from 'zod'
import fs from 'fs'
import path from 'path'
import { config } from 'dotenv'

// .env is optional: every key has a default except the LLM key, which only enables generated commentary
if (fs.existsSync(path.resolve('.env'))) {
  config({ path: '.env' })
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1')

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // CORS Configuration
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Record storage (raw documents under DATA_DIR/raw and DATA_DIR/jobs, parsed records under DATA_DIR/processed)
  DATA_DIR: z.string().default('DATA'),

  // Language model (commentary, justification, optional job analysis)
  GEMINI_API_KEY: z.string().optional(),
  LLM_ENABLED: booleanFlag,
  LLM_MODEL: z.string().default('gemini-2.5-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Scoring
  WEIGHT_PROFILE: z.coerce.number().default(0.3),
  WEIGHT_TECHNICAL: z.coerce.number().default(0.4),
  WEIGHT_SOFTSKILLS: z.coerce.number().default(0.3),
  REPORT_TOP_N: z.coerce.number().int().positive().default(5),

  // Evaluation runs
  EVALUATION_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(10),

  // Rate Limiting
  RATE_LIMIT_SHORT_TTL: z.coerce.number().int().default(60000), // 1 minute
  RATE_LIMIT_SHORT_MAX: z.coerce.number().int().default(30),
  RATE_LIMIT_LONG_TTL: z.coerce.number().int().default(3600000), // 1 hour
  RATE_LIMIT_LONG_MAX: z.coerce.number().int().default(500),
})

const configServer = configSchema.safeParse(process.env)
if (!configServer.success) {
  console.log('Invalid values in .env file')
  console.error(configServer.error)
  process.exit(1)
}

const envConfig = configServer.data

export default envConfig
