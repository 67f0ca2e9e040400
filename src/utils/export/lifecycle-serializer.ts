/**
 * Lifecycle Serializer
 *
 * JSON encoding for BlockLifecycle records. Decoding validates the document
 * against a zod schema before handing it out.
 */

import { z } from 'zod';
import type { BlockLifecycle } from '../../services/types/block/index.js';

const SandwichAttackSchema = z.object({
  frontrunTx: z.string(),
  victimTx: z.string(),
  backrunTx: z.string(),
  estimatedProfitEth: z.number(),
  dex: z.string(),
});

const ArbitrageOpSchema = z.object({
  txHash: z.string(),
  path: z.array(z.string()),
  estimatedProfitEth: z.number(),
  dexesInvolved: z.array(z.string()),
});

export const BlockLifecycleSchema: z.ZodType<BlockLifecycle> = z.object({
  blockNumber: z.number().int().nonnegative(),
  blockHash: z.string(),
  timestamp: z.number().int().nonnegative(),
  proposer: z.string(),
  builder: z.string().nullable(),
  timing: z.object({
    blockTime: z.number(),
    timestamp: z.number().int().nonnegative(),
    propagationDelay: z.number().nullable(),
  }),
  gas: z.object({
    gasUsed: z.number().nonnegative(),
    gasLimit: z.number().nonnegative(),
    utilization: z.number(),
    baseFeeGwei: z.number(),
    avgPriorityFeeGwei: z.number(),
    feesBurnedEth: z.number(),
    priorityFeesEth: z.number(),
  }),
  transactions: z.object({
    totalCount: z.number().int().nonnegative(),
    typeBreakdown: z.object({
      legacy: z.number().int().nonnegative(),
      eip2930: z.number().int().nonnegative(),
      eip1559: z.number().int().nonnegative(),
      eip4844Blob: z.number().int().nonnegative(),
    }),
    ordering: z.object({
      sortedByPriority: z.boolean(),
      anomalies: z.number().int().nonnegative(),
      avgDeviation: z.number(),
    }),
    failedCount: z.number().int().nonnegative(),
  }),
  mev: z.object({
    sandwichAttacks: z.array(SandwichAttackSchema),
    arbitrageOps: z.array(ArbitrageOpSchema),
    liquidations: z.number().int().nonnegative(),
    estimatedMevEth: z.number(),
    mevBotAddresses: z.array(z.string()),
  }),
  pbs: z.object({
    isPbsBlock: z.boolean(),
    builderAddress: z.string().nullable(),
    builderPaymentEth: z.number().nullable(),
    extraData: z.string(),
  }),
});

/**
 * Error thrown when a document is not a valid lifecycle record
 */
export class LifecycleDeserializationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'LifecycleDeserializationError';
  }
}

export function serializeLifecycle(lifecycle: BlockLifecycle, pretty = false): string {
  return JSON.stringify(lifecycle, null, pretty ? 2 : undefined);
}

/**
 * @throws LifecycleDeserializationError for malformed JSON or a document that fails validation
 */
export function deserializeLifecycle(json: string): BlockLifecycle {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (error) {
    throw new LifecycleDeserializationError(
      `Invalid lifecycle JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = BlockLifecycleSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new LifecycleDeserializationError(
      `Invalid lifecycle record: ${issues.join('; ')}`,
      issues
    );
  }
  return result.data;
}
