/**
 * Tests for EVM Block Reader Utilities
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mock, mockDeep } from 'vitest-mock-extended';
import { BlockNotFoundError, HttpRequestError, stringToHex } from 'viem';
import { mainnet } from 'viem/chains';
import type { InspectorConfig } from '../../config/inspector.js';
import type { BlockSource, RawBlock, RawTransaction } from './block-source.js';
import {
  BlockFetchError,
  getBlockWithTransactions,
  getLatestBlockNumber,
  getTransactionStatuses,
  InvalidBlockIdentifierError,
  parseBlockIdentifier,
  PendingBlockError,
  toInspectedBlock,
} from './block-reader.js';

const createRawTransaction = (overrides: Partial<RawTransaction> = {}): RawTransaction => ({
  hash: '0x01',
  from: '0x1111111111111111111111111111111111111111',
  to: '0x3333333333333333333333333333333333333333',
  value: 0n,
  gas: 21000n,
  maxFeePerGas: 40_000_000_000n,
  maxPriorityFeePerGas: 2_000_000_000n,
  type: 'eip1559',
  ...overrides,
});

const createRawBlock = (overrides: Partial<RawBlock> = {}): RawBlock => ({
  number: 19000000n,
  hash: '0xabc123',
  timestamp: 1700000000n,
  gasUsed: 15000000n,
  gasLimit: 30000000n,
  baseFeePerGas: 30000000000n,
  miner: '0x95222290dd7278aa3ddd389cc1e1d165cc4bafe5',
  extraData: stringToHex('beaverbuild.org'),
  transactions: [createRawTransaction()],
  ...overrides,
});

describe('Block Reader Utilities', () => {
  let mockConfig: ReturnType<typeof mockDeep<InspectorConfig>>;
  let mockSource: ReturnType<typeof mock<BlockSource>>;

  beforeEach(() => {
    mockConfig = mockDeep<InspectorConfig>();
    mockSource = mock<BlockSource>();

    mockConfig.getBlockSource.mockReturnValue(mockSource);
    mockConfig.getChainConfig.mockReturnValue({
      chainId: 1,
      name: 'Ethereum',
      viemChain: mainnet,
    });
  });

  describe('parseBlockIdentifier', () => {
    it('should accept latest in any case', () => {
      expect(parseBlockIdentifier('latest')).toBe('latest');
      expect(parseBlockIdentifier('LATEST')).toBe('latest');
    });

    it('should parse non-negative integers', () => {
      expect(parseBlockIdentifier('0')).toBe(0n);
      expect(parseBlockIdentifier('19000000')).toBe(19000000n);
    });

    it('should reject anything else', () => {
      expect(() => parseBlockIdentifier('-1')).toThrow(InvalidBlockIdentifierError);
      expect(() => parseBlockIdentifier('1.5')).toThrow(InvalidBlockIdentifierError);
      expect(() => parseBlockIdentifier('0x10')).toThrow(InvalidBlockIdentifierError);
      expect(() => parseBlockIdentifier('')).toThrow(InvalidBlockIdentifierError);
    });
  });

  describe('toInspectedBlock', () => {
    it('should map block and transaction fields', () => {
      const result = toInspectedBlock(createRawBlock());

      expect(result.number).toBe(19000000n);
      expect(result.hash).toBe('0xabc123');
      expect(result.baseFeePerGas).toBe(30000000000n);
      expect(result.transactions).toEqual([
        {
          hash: '0x01',
          from: '0x1111111111111111111111111111111111111111',
          to: '0x3333333333333333333333333333333333333333',
          value: 0n,
          gas: 21000n,
          maxFeePerGas: 40_000_000_000n,
          maxPriorityFeePerGas: 2_000_000_000n,
          type: 'eip1559',
        },
      ]);
    });

    it('should turn absent fee fields into null', () => {
      const result = toInspectedBlock(
        createRawBlock({
          baseFeePerGas: undefined,
          transactions: [
            createRawTransaction({
              maxFeePerGas: undefined,
              maxPriorityFeePerGas: undefined,
              type: 'legacy',
            }),
          ],
        })
      );

      expect(result.baseFeePerGas).toBeNull();
      expect(result.transactions[0]?.maxFeePerGas).toBeNull();
      expect(result.transactions[0]?.maxPriorityFeePerGas).toBeNull();
    });

    it('should reject pending blocks', () => {
      expect(() => toInspectedBlock(createRawBlock({ number: null }))).toThrow(
        PendingBlockError
      );
      expect(() => toInspectedBlock(createRawBlock({ hash: null }))).toThrow(
        PendingBlockError
      );
    });
  });

  describe('getBlockWithTransactions', () => {
    it('should read a block by number', async () => {
      mockSource.getBlock.mockResolvedValue(createRawBlock());

      const result = await getBlockWithTransactions(19000000n, mockConfig);

      expect(result?.number).toBe(19000000n);
      expect(mockSource.getBlock).toHaveBeenCalledWith(19000000n);
    });

    it('should read the latest block', async () => {
      mockSource.getBlock.mockResolvedValue(createRawBlock());

      await getBlockWithTransactions('latest', mockConfig);

      expect(mockSource.getBlock).toHaveBeenCalledWith('latest');
    });

    it('should return null for a missing block', async () => {
      mockSource.getBlock.mockRejectedValue(
        new BlockNotFoundError({ blockNumber: 99999999n })
      );

      await expect(getBlockWithTransactions(99999999n, mockConfig)).resolves.toBeNull();
    });

    it('should wrap RPC failures with block and chain', async () => {
      const cause = new HttpRequestError({ url: 'https://rpc.example.com', status: 500 });
      mockSource.getBlock.mockRejectedValue(cause);

      const error = await getBlockWithTransactions(19000000n, mockConfig).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(BlockFetchError);
      if (error instanceof BlockFetchError) {
        expect(error.message).toContain('Failed to get block 19000000 on Ethereum (Chain ID: 1)');
        expect(error.identifier).toBe('19000000');
        expect(error.chainName).toBe('Ethereum');
        expect(error.cause).toBe(cause);
      }
    });
  });

  describe('getLatestBlockNumber', () => {
    it('should return the chain head', async () => {
      mockSource.getBlockNumber.mockResolvedValue(19000100n);

      await expect(getLatestBlockNumber(mockConfig)).resolves.toBe(19000100n);
    });

    it('should wrap errors', async () => {
      mockSource.getBlockNumber.mockRejectedValue(new Error('Connection refused'));

      await expect(getLatestBlockNumber(mockConfig)).rejects.toThrow(
        'Failed to get current block number on Ethereum (Chain ID: 1): Connection refused'
      );
    });
  });

  describe('getTransactionStatuses', () => {
    it('should return statuses in input order', async () => {
      mockSource.getReceiptStatus.mockImplementation(async (hash) =>
        hash === '0x02' ? 'reverted' : 'success'
      );

      const result = await getTransactionStatuses(['0x01', '0x02', '0x03'], mockConfig);

      expect(result).toEqual(['success', 'reverted', 'success']);
    });

    it('should return an empty list without calls', async () => {
      await expect(getTransactionStatuses([], mockConfig)).resolves.toEqual([]);
      expect(mockSource.getReceiptStatus).not.toHaveBeenCalled();
    });

    it('should name the receipt that failed', async () => {
      mockSource.getReceiptStatus.mockRejectedValue(new Error('timeout'));

      await expect(getTransactionStatuses(['0x0a'], mockConfig)).rejects.toThrow(
        'Failed to get receipt 0x0a on Ethereum (Chain ID: 1): timeout'
      );
    });
  });
});
