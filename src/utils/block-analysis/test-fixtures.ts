/**
 * Test fixtures for block analysis tests
 * Builders for blocks, transactions and lifecycle records with overridable fields
 */

import { stringToHex } from 'viem';
import type {
  BlockLifecycle,
  InspectedBlock,
  InspectedTransaction,
} from '../../services/types/block/index.js';

export const GWEI = 1_000_000_000n;

export const BOT_ADDRESS = '0x0000000000007f150bd6f54c40a34d7c3d5e9f56';
export const ALICE = '0x1111111111111111111111111111111111111111';
export const BOB = '0x2222222222222222222222222222222222222222';
export const ROUTER = '0x3333333333333333333333333333333333333333';
export const MINER = '0x95222290dd7278aa3ddd389cc1e1d165cc4bafe5';

let txCounter = 0;

export function createTransaction(
  overrides: Partial<InspectedTransaction> = {}
): InspectedTransaction {
  txCounter++;
  return {
    hash: `0x${txCounter.toString(16).padStart(64, '0')}`,
    from: ALICE,
    to: ROUTER,
    value: 0n,
    gas: 21_000n,
    maxFeePerGas: 40n * GWEI,
    maxPriorityFeePerGas: 2n * GWEI,
    type: 'eip1559',
    ...overrides,
  };
}

export function createBlock(overrides: Partial<InspectedBlock> = {}): InspectedBlock {
  return {
    number: 19_000_000n,
    hash: '0xabc123',
    timestamp: 1_700_000_012n,
    gasUsed: 15_000_000n,
    gasLimit: 30_000_000n,
    baseFeePerGas: 30n * GWEI,
    miner: MINER,
    extraData: stringToHex('beaverbuild.org'),
    transactions: [],
    ...overrides,
  };
}

export function createLifecycle(overrides: Partial<BlockLifecycle> = {}): BlockLifecycle {
  return {
    blockNumber: 18_000_000,
    blockHash: '0x1234567890abcdef',
    timestamp: 1_698_765_432,
    proposer: '0xabcdef',
    builder: 'flashbots',
    timing: {
      blockTime: 12.05,
      timestamp: 1_698_765_432,
      propagationDelay: null,
    },
    gas: {
      gasUsed: 29_834_521,
      gasLimit: 30_000_000,
      utilization: 99.45,
      baseFeeGwei: 25.34,
      avgPriorityFeeGwei: 1.52,
      feesBurnedEth: 0.7563,
      priorityFeesEth: 0.0453,
    },
    transactions: {
      totalCount: 247,
      typeBreakdown: { legacy: 12, eip2930: 5, eip1559: 225, eip4844Blob: 5 },
      ordering: { sortedByPriority: false, anomalies: 3, avgDeviation: 0 },
      failedCount: 0,
    },
    mev: {
      sandwichAttacks: [],
      arbitrageOps: [],
      liquidations: 0,
      estimatedMevEth: 2.3451,
      mevBotAddresses: ['0x123'],
    },
    pbs: {
      isPbsBlock: true,
      builderAddress: 'flashbots',
      builderPaymentEth: null,
      extraData: 'flashbots',
    },
    ...overrides,
  };
}
