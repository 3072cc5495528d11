import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { envInt } from '../util/env.js';

const assetSchema = z.object({
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(36),
}).strict();

const ledgerConfigSchema = z.object({
  owner: z.string().min(1),
  treasury: z.string().min(1),
  assets: z.object({ A: assetSchema, B: assetSchema }).strict(),
  oracle: z.object({
    maxAgeSeconds: z.number().int().positive(),
  }).strict(),
  liquidation: z.object({
    discountRate: z.number().int().min(0).max(100),
  }).strict(),
  database: z.object({
    path: z.string().min(1),
  }).strict(),
}).strict();

export type AssetConfig = z.infer<typeof assetSchema>;
export type LedgerConfig = z.infer<typeof ledgerConfigSchema>;

export const DEFAULT_CONFIG: LedgerConfig = {
  owner: 'owner',
  treasury: 'ledger:treasury',
  assets: {
    A: { symbol: 'WBTC', decimals: 8 },
    B: { symbol: 'USDC', decimals: 6 },
  },
  oracle: { maxAgeSeconds: 3600 },
  liquidation: { discountRate: 95 },
  database: { path: ':memory:' },
};

export const DEFAULT_CONFIG_FILE = path.resolve(process.cwd(), 'config', 'ledger.json');

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function merge(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [k, v] of Object.entries(over)) {
    const prev = out[k];
    out[k] = isRecord(prev) && isRecord(v) ? merge(prev, v) : v;
  }
  return out;
}

function envOverrides(env: NodeJS.ProcessEnv): DeepPartial<LedgerConfig> {
  const out: DeepPartial<LedgerConfig> = {};
  if (env.LEDGER_OWNER) out.owner = env.LEDGER_OWNER;
  if (env.LEDGER_DB_PATH) out.database = { path: env.LEDGER_DB_PATH };
  const maxAge = envInt('LEDGER_ORACLE_MAX_AGE', env);
  if (maxAge !== undefined) out.oracle = { maxAgeSeconds: maxAge };
  return out;
}

/**
 * Resolve the ledger configuration: defaults, then the JSON file (if present),
 * then `overrides`, then environment variables. Throws a ZodError on bad values.
 */
export function loadConfig(opts: { file?: string; overrides?: DeepPartial<LedgerConfig>; env?: NodeJS.ProcessEnv } = {}): LedgerConfig {
  const file = opts.file ?? DEFAULT_CONFIG_FILE;
  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  if (fs.existsSync(file)) {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    if (!isRecord(parsed)) throw new TypeError(`${file}: expected a JSON object`);
    merged = merge(merged, parsed);
  }
  if (opts.overrides) merged = merge(merged, opts.overrides);
  merged = merge(merged, envOverrides(opts.env ?? process.env));
  return ledgerConfigSchema.parse(merged);
}
