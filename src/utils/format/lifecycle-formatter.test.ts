/**
 * Tests for the lifecycle formatter
 */

import { describe, it, expect } from 'vitest';
import {
  ALICE,
  createBlock,
  createLifecycle,
  createTransaction,
  GWEI,
  ROUTER,
} from '../block-analysis/test-fixtures.js';
import { formatBlockLifecycle, formatTransactionDetails } from './lifecycle-formatter.js';

describe('formatBlockLifecycle', () => {
  const lifecycle = createLifecycle({
    gas: {
      gasUsed: 15_000_000,
      gasLimit: 30_000_000,
      utilization: 50,
      baseFeeGwei: 25.34,
      avgPriorityFeeGwei: 1.52,
      feesBurnedEth: 0.7563,
      priorityFeesEth: 0.0453,
    },
  });

  it('should render the header and every section in order', () => {
    const lines = formatBlockLifecycle(lifecycle).split('\n');
    const sections = lines.filter((line) => /^[A-Z ]+$/.test(line));

    expect(lines[2]).toBe('Block Number: 18000000');
    expect(sections).toEqual([
      'TIMING METRICS',
      'GAS METRICS',
      'TRANSACTIONS',
      'MEV INDICATORS',
      'PBS METRICS',
    ]);
  });

  it('should format metrics with fixed precision', () => {
    const lines = formatBlockLifecycle(lifecycle).split('\n');

    expect(lines).toContain('  Block Time: 12.05s');
    expect(lines).toContain('  Gas Used: 15000000 / 30000000 (50.0%)');
    expect(lines).toContain('  Base Fee: 25.34 gwei');
    expect(lines).toContain('  Fees Burned: 0.7563 ETH');
    expect(lines).toContain('  Types: Legacy(12), EIP-2930(5), EIP-1559(225), EIP-4844(5)');
    expect(lines).toContain('  Priority Ordering: 3 anomalies');
    expect(lines).toContain('  Estimated MEV: 2.3451 ETH');
    expect(lines).toContain('  PBS Block: Yes');
    expect(lines[lines.length - 1]).toBe('  Builder: flashbots');
  });

  it('should omit the builder line for non-PBS blocks', () => {
    const output = formatBlockLifecycle(
      createLifecycle({
        builder: null,
        pbs: { isPbsBlock: false, builderAddress: null, builderPaymentEth: null, extraData: '' },
      })
    );

    expect(output.endsWith('  PBS Block: No')).toBe(true);
  });
});

describe('formatTransactionDetails', () => {
  it('should list transaction fields', () => {
    const tx = createTransaction({ from: ALICE, to: ROUTER, value: 10n ** 18n });

    const lines = formatTransactionDetails(createBlock({ transactions: [tx] })).split('\n');

    expect(lines).toEqual([
      '',
      'TRANSACTION DETAILS',
      '─'.repeat(50),
      '',
      `Tx #1: ${tx.hash}`,
      `  From: ${ALICE}`,
      `  To: ${ROUTER}`,
      '  Value: 1 ETH',
      '  Max Fee: 40 gwei',
      '  Priority Fee: 2 gwei',
    ]);
  });

  it('should skip fee lines for legacy transactions and mark contract creation', () => {
    const tx = createTransaction({
      to: null,
      maxFeePerGas: null,
      maxPriorityFeePerGas: null,
      type: 'legacy',
    });

    const lines = formatTransactionDetails(createBlock({ transactions: [tx] })).split('\n');

    expect(lines.slice(5)).toEqual([`  From: ${ALICE}`, '  To: (contract creation)', '  Value: 0 ETH']);
  });

  it('should cap the listing at ten transactions', () => {
    const transactions = Array.from({ length: 12 }, () =>
      createTransaction({ maxPriorityFeePerGas: 3n * GWEI })
    );

    const output = formatTransactionDetails(createBlock({ transactions }));

    expect(output).toContain('Tx #10:');
    expect(output).not.toContain('Tx #11:');
    expect(output.endsWith('\n... and 2 more transactions')).toBe(true);
  });

  it('should not add a remainder line at exactly ten', () => {
    const transactions = Array.from({ length: 10 }, () => createTransaction());

    expect(formatTransactionDetails(createBlock({ transactions }))).not.toContain('more transactions');
  });
});
