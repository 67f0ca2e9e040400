/**
 * Block Analysis
 *
 * Pure analyzers that turn an InspectedBlock into a BlockLifecycle.
 */

export {
  calculateGasMetrics,
  calculateUtilization,
  sumPriorityFees,
  type GasMetricsInput,
} from './gas-metrics.js';

export {
  classifyTransactionType,
  countTransactionTypes,
  analyzeTransactionOrdering,
  analyzeTransactions,
} from './transaction-ordering.js';

export {
  MevDetector,
  groupBySender,
  findSandwichCandidates,
  priorityFeeSpendEth,
  type MevDetectorOptions,
  type MevTransaction,
} from './mev-detector.js';

export { PbsAnalyzer, decodeExtraData, type PbsAnalyzerOptions } from './pbs-analyzer.js';

export {
  BlockLifecycleAssembler,
  assembleBlockLifecycle,
  calculateBlockTime,
  calculateTimingMetrics,
  type BlockLifecycleAssemblerDependencies,
  type AssembleOptions,
} from './lifecycle-assembler.js';
