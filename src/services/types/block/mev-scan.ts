/**
 * Result of scanning recent blocks for MEV activity
 */

export interface MevFlaggedBlock {
  blockNumber: number;
  estimatedMevEth: number;
  sandwichAttackCount: number;
  arbitrageOpCount: number;
}

export interface MevScanSummary {
  /** Number of blocks requested, used as the averaging denominator */
  blocksAnalyzed: number;
  blocksWithMev: number;
  totalMevEth: number;
  averageMevPerBlockEth: number;
  /** Blocks at or above the threshold, in ascending height order */
  flaggedBlocks: MevFlaggedBlock[];
}
