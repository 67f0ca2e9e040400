/**
 * Lifecycle Assembler - Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { stringToHex } from 'viem';
import {
  BlockLifecycleAssembler,
  assembleBlockLifecycle,
  calculateBlockTime,
} from './lifecycle-assembler.js';
import { MevDetector } from './mev-detector.js';
import { PbsAnalyzer } from './pbs-analyzer.js';
import { AnalysisRegistry } from '../../config/analysis-registry.js';
import {
  ALICE,
  BOT_ADDRESS,
  MINER,
  createBlock,
  createTransaction,
  GWEI,
} from './test-fixtures.js';

describe('BlockLifecycleAssembler', () => {
  describe('calculateBlockTime', () => {
    it('should be the timestamp delta to the predecessor', () => {
      expect(
        calculateBlockTime({ timestamp: 1_700_000_012n }, { timestamp: 1_700_000_000n })
      ).toBe(12);
    });

    it('should be exactly 0 without a predecessor', () => {
      expect(calculateBlockTime({ timestamp: 1_700_000_012n }, null)).toBe(0);
    });
  });

  describe('assemble', () => {
    const registry = new AnalysisRegistry({ knownActors: [BOT_ADDRESS] });
    const assembler = new BlockLifecycleAssembler({
      mevDetector: new MevDetector({ registry }),
      pbsAnalyzer: new PbsAnalyzer({ builderFragments: registry.builderFragments }),
    });

    const block = createBlock({
      extraData: stringToHex('beaverbuild.org'),
      transactions: [
        createTransaction({ from: BOT_ADDRESS, maxPriorityFeePerGas: 2n * GWEI }),
        createTransaction({ from: ALICE, maxPriorityFeePerGas: 3n * GWEI }),
        createTransaction({ from: BOT_ADDRESS, maxPriorityFeePerGas: 1n * GWEI, type: 'eip2930' }),
      ],
    });
    const previous = createBlock({ number: 18_999_999n, timestamp: 1_700_000_000n });

    it('should combine every analyzer into one record', () => {
      const lifecycle = assembler.assemble(block, previous);

      expect(lifecycle.blockNumber).toBe(19_000_000);
      expect(lifecycle.blockHash).toBe('0xabc123');
      expect(lifecycle.timestamp).toBe(1_700_000_012);
      expect(lifecycle.proposer).toBe(MINER);
      expect(lifecycle.timing).toEqual({
        blockTime: 12,
        timestamp: 1_700_000_012,
        propagationDelay: null,
      });
      expect(lifecycle.gas.utilization).toBe(50);
      expect(lifecycle.gas.avgPriorityFeeGwei).toBe(2);
      expect(lifecycle.transactions.totalCount).toBe(3);
      expect(lifecycle.transactions.typeBreakdown).toEqual({
        legacy: 0,
        eip2930: 1,
        eip1559: 2,
        eip4844Blob: 0,
      });
      expect(lifecycle.transactions.ordering.anomalies).toBe(1);
      expect(lifecycle.mev.mevBotAddresses).toEqual([BOT_ADDRESS]);
      expect(lifecycle.mev.estimatedMevEth).toBeCloseTo(0.000063, 12);
    });

    it('should take the builder from the PBS analysis', () => {
      const lifecycle = assembler.assemble(block, previous);

      expect(lifecycle.pbs.isPbsBlock).toBe(true);
      expect(lifecycle.builder).toBe('beaverbuild.org');
      expect(lifecycle.pbs.builderAddress).toBe('beaverbuild.org');
    });

    it('should leave the builder null for non-PBS blocks', () => {
      const lifecycle = assembler.assemble(
        createBlock({ extraData: stringToHex('geth') }),
        null
      );

      expect(lifecycle.builder).toBeNull();
      expect(lifecycle.timing.blockTime).toBe(0);
    });

    it('should run each analyzer exactly once', () => {
      const mevDetector = new MevDetector({ registry });
      const pbsAnalyzer = new PbsAnalyzer();
      const detectSpy = vi.spyOn(mevDetector, 'detect');
      const analyzeSpy = vi.spyOn(pbsAnalyzer, 'analyze');

      new BlockLifecycleAssembler({ mevDetector, pbsAnalyzer }).assemble(block, previous);

      expect(detectSpy).toHaveBeenCalledTimes(1);
      expect(analyzeSpy).toHaveBeenCalledTimes(1);
    });

    it('should count reverted receipts when statuses are supplied', () => {
      const lifecycle = assembler.assemble(block, previous, {
        receiptStatuses: ['success', 'reverted', 'success'],
      });

      expect(lifecycle.transactions.failedCount).toBe(1);
    });

    it('should produce a frozen record', () => {
      const lifecycle = assembler.assemble(block, previous);

      expect(Object.isFrozen(lifecycle)).toBe(true);
      expect(Object.isFrozen(lifecycle.gas)).toBe(true);
      expect(Object.isFrozen(lifecycle.mev.mevBotAddresses)).toBe(true);
    });

    it('should produce equal records for identical input', () => {
      expect(assembler.assemble(block, previous)).toEqual(assembler.assemble(block, previous));
    });

    it('should keep type counts summing to the total', () => {
      const lifecycle = assembleBlockLifecycle(
        createBlock({
          transactions: ['0x0', '0x1', '0x2', '0x3', 'eip7702', null].map((type) =>
            createTransaction({ type })
          ),
        }),
        null
      );
      const { legacy, eip2930, eip1559, eip4844Blob } = lifecycle.transactions.typeBreakdown;

      expect(legacy + eip2930 + eip1559 + eip4844Blob).toBe(lifecycle.transactions.totalCount);
      expect(legacy).toBe(3);
    });
  });
});
