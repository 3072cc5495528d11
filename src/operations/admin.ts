import { z } from 'zod';
import type { PoolRegistry } from '../pools/registry.js';
import { type NewPool, type Pool, type PoolParams } from '../pools/types.js';
import { LedgerError } from '../utils/errors.js';

const rateSchema = z.number().int().min(0).max(255);

const paramsSchema = z.object({
  interestRate: rateSchema,
  reserveFeeRate: rateSchema,
  collateralFactor: rateSchema,
}).strict();

const newPoolSchema = paramsSchema.extend({
  id: z.string().regex(/^[a-z0-9][a-z0-9._-]{0,63}$/i, 'pool id: letters, digits, . _ - (max 64)'),
  orientation: z.enum(['asset-a-collateral', 'asset-b-collateral']),
}).strict();

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const res = schema.safeParse(input);
  if (!res.success) {
    throw new LedgerError('InvalidParams', res.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; '), {
      issues: res.error.issues,
    });
  }
  return res.data;
}

function requireOwner(caller: string, owner: string): void {
  if (caller !== owner) throw new LedgerError('Unauthorized', 'only the ledger owner may administer pools', { caller });
}

export function createPool(pools: PoolRegistry, owner: string, caller: string, spec: NewPool, now: number): Pool {
  requireOwner(caller, owner);
  const valid = parse(newPoolSchema, spec);
  return pools.create(valid, now);
}

export function updatePoolParams(pools: PoolRegistry, owner: string, caller: string, poolId: string, patch: Partial<PoolParams>, now: number): Pool {
  requireOwner(caller, owner);
  const current = pools.require(poolId);
  const defined = Object.fromEntries(Object.entries(patch).filter(([, v]) => v !== undefined));
  const next = parse(paramsSchema, { ...current.params, ...defined });
  return pools.updateParams(poolId, next, now);
}
