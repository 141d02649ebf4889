/**
 * Receipt Split MCP Server - Configuration
 *
 * Read once from the environment (and a .env file, if present).
 */

import 'dotenv/config';
import { z } from 'zod';

import { SUPPORTED_CURRENCIES } from './models/types.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  MCP_URL: z.string().url().optional(),
  DEFAULT_CURRENCY: z
    .string()
    .default('USD')
    .refine(code => code in SUPPORTED_CURRENCIES, { message: 'Unsupported currency code' }),
  DEFAULT_TAXABLE: booleanFlag.prefault('true'),
});

export interface ServerConfig {
  port: number;
  baseUrl: string;
  defaultCurrency: string;
  defaultTaxable: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`);
  }

  const { PORT, MCP_URL, DEFAULT_CURRENCY, DEFAULT_TAXABLE } = parsed.data;
  return {
    port: PORT,
    baseUrl: MCP_URL || `http://localhost:${PORT}`,
    defaultCurrency: DEFAULT_CURRENCY,
    defaultTaxable: DEFAULT_TAXABLE,
  };
}
