export type {
  InspectedBlock,
  InspectedTransaction,
  TransactionTypeBucket,
  TransactionStatus,
} from './inspected-block.js';

export type {
  BlockLifecycle,
  TimingMetrics,
  GasMetrics,
  TypeBreakdown,
  OrderingMetrics,
  TransactionMetrics,
  SandwichAttack,
  ArbitrageOp,
  MevIndicators,
  PbsMetrics,
} from './block-lifecycle.js';

export type { MevScanSummary, MevFlaggedBlock } from './mev-scan.js';
