/**
 * Tests for lifecycle JSON serialization
 */

import { describe, it, expect } from 'vitest';
import { createLifecycle } from '../block-analysis/test-fixtures.js';
import {
  deserializeLifecycle,
  LifecycleDeserializationError,
  serializeLifecycle,
} from './lifecycle-serializer.js';

describe('serializeLifecycle / deserializeLifecycle', () => {
  it('should restore an equal record', () => {
    const lifecycle = createLifecycle({
      mev: {
        sandwichAttacks: [
          {
            frontrunTx: '0x01',
            victimTx: '0x02',
            backrunTx: '0x03',
            estimatedProfitEth: 0.000084,
            dex: '0x3333333333333333333333333333333333333333',
          },
        ],
        arbitrageOps: [],
        liquidations: 0,
        estimatedMevEth: 0.000084,
        mevBotAddresses: [],
      },
    });

    expect(deserializeLifecycle(serializeLifecycle(lifecycle))).toEqual(lifecycle);
  });

  it('should keep nulls', () => {
    const lifecycle = createLifecycle({ builder: null });

    const restored = deserializeLifecycle(serializeLifecycle(lifecycle, true));

    expect(restored.builder).toBeNull();
    expect(restored.timing.propagationDelay).toBeNull();
    expect(restored.pbs.builderPaymentEth).toBeNull();
  });

  it('should indent when asked', () => {
    expect(serializeLifecycle(createLifecycle(), true)).toContain('\n  "blockNumber": 18000000,');
    expect(serializeLifecycle(createLifecycle())).not.toContain('\n');
  });

  it('should reject malformed JSON', () => {
    expect(() => deserializeLifecycle('{not json')).toThrow(LifecycleDeserializationError);
  });

  it('should name the failing field', () => {
    const json = serializeLifecycle(createLifecycle()).replace(
      '"utilization":99.45',
      '"utilization":"high"'
    );

    try {
      deserializeLifecycle(json);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LifecycleDeserializationError);
      if (error instanceof LifecycleDeserializationError) {
        expect(error.issues).toEqual(['gas.utilization: Expected number, received string']);
      }
    }
  });
});
