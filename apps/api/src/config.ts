import { config as loadEnv } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));
const loadEnvIfExists = (path: string) => {
  if (existsSync(path)) {
    loadEnv({ path, override: true });
  }
};

const projectRoot = resolve(__dirname, '../../..');
const apiRoot = resolve(__dirname, '..');
const rootEnv = resolve(projectRoot, '.env');
const rootLocalEnv = resolve(projectRoot, '.env.local');
const apiEnv = resolve(apiRoot, '.env');

loadEnvIfExists(rootEnv);
loadEnvIfExists(rootLocalEnv);
loadEnvIfExists(apiEnv);

const envSchema = z.object({
  DATASET_PATH: z.string().default('vehicles.csv').transform((value) => value || 'vehicles.csv'),
  PORT: z.string().regex(/^\d+$/, 'PORT must be a number').optional(),
  ALLOWED_ORIGIN: z.string().optional()
});

const parsed = envSchema.parse(process.env);

export const config = {
  datasetPath: parsed.DATASET_PATH,
  port: Number(parsed.PORT ?? 4000),
  allowedOrigin: parsed.ALLOWED_ORIGIN ?? '*'
};
