/**
 * Analysis Registry
 *
 * Static lookup tables used by the MEV and PBS analyzers: addresses of known
 * extractive actors (searcher bots) and extraData fragments that identify
 * block builders. Tables are immutable once built and are injected into the
 * analyzers, so tests and callers can substitute their own.
 */

/**
 * Lookup capability for known extractive actors
 */
export interface KnownActorRegistry {
  isKnownExtractiveActor(address: string): boolean;
}

/**
 * Known MEV bot addresses (partial list)
 */
export const DEFAULT_KNOWN_MEV_BOTS: readonly string[] = [
  '0x0000000000007f150bd6f54c40a34d7c3d5e9f56',
  '0xa57bd00134b2850b2a1c55860c9e9ea100fdd6cf',
  '0x00000000003b3cc22af3ae1eac0440bcee416b40',
];

/**
 * Builder name fragments commonly found in a block's extraData
 */
export const DEFAULT_BUILDER_FRAGMENTS: readonly string[] = [
  'flashbots',
  'builder0x69',
  'rsync',
  'beaverbuild',
];

export interface AnalysisRegistryInput {
  knownActors?: readonly string[];
  builderFragments?: readonly string[];
}

/**
 * Immutable registry of known actors and builder fragments
 *
 * Addresses and fragments are stored lower-case; lookups are case-insensitive.
 *
 * @example
 * ```typescript
 * const registry = new AnalysisRegistry({ knownActors: ['0xABC...'] });
 * registry.isKnownExtractiveActor('0xabc...'); // true
 * ```
 */
export class AnalysisRegistry implements KnownActorRegistry {
  private readonly knownActors: ReadonlySet<string>;
  readonly builderFragments: readonly string[];

  constructor(input: AnalysisRegistryInput = {}) {
    this.knownActors = new Set(
      (input.knownActors ?? DEFAULT_KNOWN_MEV_BOTS).map((address) =>
        address.toLowerCase()
      )
    );
    this.builderFragments = Object.freeze(
      (input.builderFragments ?? DEFAULT_BUILDER_FRAGMENTS)
        .map((fragment) => fragment.toLowerCase())
        .filter((fragment) => fragment.length > 0)
    );
  }

  isKnownExtractiveActor(address: string): boolean {
    return this.knownActors.has(address.toLowerCase());
  }

  get knownActorCount(): number {
    return this.knownActors.size;
  }

  /**
   * Returns a new registry with extra actors added; this one is left untouched
   */
  withKnownActors(addresses: readonly string[]): AnalysisRegistry {
    return new AnalysisRegistry({
      knownActors: [...this.knownActors, ...addresses],
      builderFragments: this.builderFragments,
    });
  }
}

let defaultRegistry: AnalysisRegistry | null = null;

/**
 * Registry built from the default tables
 */
export function getDefaultAnalysisRegistry(): AnalysisRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new AnalysisRegistry();
  }
  return defaultRegistry;
}
