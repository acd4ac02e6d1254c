import { z } from 'zod';

const envSchema = z.object({
  PORT: z.string().default('3003'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATA_FILE: z.string().default('./data/water_data.xlsx'),
  DATA_SHEET: z.string().default('FieldData'),
  FRONTEND_URL: z.string().optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: parseInt(env.PORT, 10),
  nodeEnv: env.NODE_ENV,
  dataFile: env.DATA_FILE,
  dataSheet: env.DATA_SHEET,
  frontendUrl: env.FRONTEND_URL,
} as const;
