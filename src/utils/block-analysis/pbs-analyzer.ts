/**
 * PBS Attribution Analyzer
 *
 * Attributes a block to a known builder by matching fragments of builder
 * names against the block's extraData.
 */

import { hexToString, isHex } from 'viem';
import type { PbsMetrics } from '../../services/types/block/index.js';
import { getDefaultAnalysisRegistry } from '../../config/analysis-registry.js';
import { createServiceLogger, log } from '../../logging/index.js';

const logger = createServiceLogger('PbsAnalyzer');

/**
 * Decode extraData bytes as UTF-8
 *
 * Invalid sequences become U+FFFD. A value that is not hex at all decodes
 * to the empty string.
 */
export function decodeExtraData(extraData: string): string {
  if (!isHex(extraData)) {
    log.fallback(logger, 'decodeExtraData', '', { extraData });
    return '';
  }
  return hexToString(extraData);
}

export interface PbsAnalyzerOptions {
  /**
   * Lower-case builder name fragments
   * If not provided, the default analysis registry's fragments will be used
   */
  builderFragments?: readonly string[];
}

export class PbsAnalyzer {
  private readonly builderFragments: readonly string[];

  constructor(options: PbsAnalyzerOptions = {}) {
    this.builderFragments = (
      options.builderFragments ?? getDefaultAnalysisRegistry().builderFragments
    )
      .map((fragment) => fragment.toLowerCase())
      .filter((fragment) => fragment.length > 0);
  }

  /**
   * Builder identity is the whole decoded extraData, not only the matched
   * fragment. Builder payment is not computed.
   *
   * @example
   * ```typescript
   * new PbsAnalyzer().analyze(stringToHex('Illuminate Dmocratize Dstribute'));
   * // { isPbsBlock: false, builderAddress: null, builderPaymentEth: null, extraData: '...' }
   * ```
   */
  analyze(extraData: string): PbsMetrics {
    const decoded = decodeExtraData(extraData);
    const haystack = decoded.toLowerCase();
    const isPbsBlock = this.builderFragments.some((fragment) =>
      haystack.includes(fragment)
    );

    return {
      isPbsBlock,
      builderAddress: isPbsBlock ? decoded : null,
      builderPaymentEth: null,
      extraData: decoded,
    };
  }
}
