/**
 * Read-only queries over a finished decay registry.
 *
 * Every result is a fresh plain object; nothing returned here aliases the
 * registry's internal blocks.
 */
import { DepthExceededError, UnknownParticleError } from "./errors.js";
import type { DecayRegistry } from "./registry.js";
import type {
  DecayBlock,
  DecayChain,
  DecayNode,
  FinalState,
  ParticleName,
} from "./types.js";

export type ChainOptions = {
  /**
   * Maximum number of expanded levels, the root being level 1.
   * Expanding deeper throws `DepthExceededError`. Default 1000.
   */
  maxDepth?: number;
  /** Particles never expanded below the root, even when they have decays */
  stableParticles?: Iterable<ParticleName>;
};

export const DEFAULT_MAX_DEPTH = 1000;

type Walk = {
  registry: DecayRegistry;
  maxDepth: number;
  stop: ReadonlySet<ParticleName>;
};

function startWalk(registry: DecayRegistry, root: ParticleName, options: ChainOptions): [Walk, DecayBlock] {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  const block = registry.get(root);
  if (!block) throw new UnknownParticleError(root);
  return [{ registry, maxDepth, stop: new Set(options.stableParticles ?? []) }, block];
}

/**
 * Block to expand for a non-root particle, if any. A block without channels
 * marks its particle as stable.
 */
function blockBelowRoot(walk: Walk, particle: ParticleName, level: number): DecayBlock | undefined {
  if (walk.stop.has(particle)) return undefined;
  const block = walk.registry.get(particle);
  if (!block || block.channels.length === 0) return undefined;
  if (level > walk.maxDepth) throw new DepthExceededError(particle, walk.maxDepth);
  return block;
}

// ── resolveChain ───────────────────────────────────────────────────────────

/**
 * Expand `root` into a nested `DecayNode` tree. Every daughter with its own
 * decay block is expanded recursively; the others are stable leaves. A root
 * whose block has no channels is itself a stable leaf.
 */
export function resolveChain(registry: DecayRegistry, root: ParticleName, options: ChainOptions = {}): DecayNode {
  const [walk, block] = startWalk(registry, root, options);
  return expandBlock(walk, block, 1);
}

function expandBlock(walk: Walk, block: DecayBlock, level: number): DecayNode {
  return {
    particle: block.particle,
    stable: block.channels.length === 0,
    channels: block.channels.map((ch) => ({
      fraction: ch.fraction,
      daughters: [...ch.daughters],
      model: ch.model,
      modelParams: [...ch.modelParams],
      photos: ch.photos,
      products: ch.daughters.map((d) => expandParticle(walk, d, level + 1)),
    })),
  };
}

function expandParticle(walk: Walk, particle: ParticleName, level: number): DecayNode {
  const block = blockBelowRoot(walk, particle, level);
  if (!block) return { particle, stable: true, channels: [] };
  return expandBlock(walk, block, level);
}

// ── enumerateFinalStates ───────────────────────────────────────────────────

/**
 * All fully expanded final states of `root`, depth-first in declared channel
 * order. Each state's fraction is the product of the branching fractions
 * along its path.
 *
 * A particle whose block has no channels, the root included, is one final
 * state of itself with fraction 1.
 *
 * The sequence is lazy and can be iterated any number of times. An unknown
 * root throws immediately; `DepthExceededError` surfaces during iteration.
 */
export function enumerateFinalStates(
  registry: DecayRegistry,
  root: ParticleName,
  options: ChainOptions = {},
): Iterable<FinalState> {
  const [walk, block] = startWalk(registry, root, options);
  return {
    [Symbol.iterator]: () => (block.channels.length === 0 ? leaf(root) : statesOfBlock(walk, block, 1)),
  };
}

function* statesOfBlock(walk: Walk, block: DecayBlock, level: number): Generator<FinalState> {
  for (const ch of block.channels) {
    for (const rest of productOf(walk, ch.daughters, 0, level + 1)) {
      yield { fraction: ch.fraction * rest.fraction, particles: rest.particles };
    }
  }
}

function* leaf(particle: ParticleName): Generator<FinalState> {
  yield { fraction: 1, particles: [particle] };
}

function* statesOfParticle(walk: Walk, particle: ParticleName, level: number): Generator<FinalState> {
  const block = blockBelowRoot(walk, particle, level);
  yield* block ? statesOfBlock(walk, block, level) : leaf(particle);
}

/** Ordered cartesian product of the daughters' final states */
function* productOf(
  walk: Walk,
  daughters: readonly ParticleName[],
  index: number,
  level: number,
): Generator<FinalState> {
  if (index === daughters.length) {
    yield { fraction: 1, particles: [] };
    return;
  }
  for (const head of statesOfParticle(walk, daughters[index], level)) {
    for (const tail of productOf(walk, daughters, index + 1, level)) {
      yield {
        fraction: head.fraction * tail.fraction,
        particles: [...head.particles, ...tail.particles],
      };
    }
  }
}

// ── buildDecayChain ────────────────────────────────────────────────────────

/**
 * Compact nested form of `resolveChain`:
 * `{ "D+": [{ bf: 1, fs: ["K-", "pi+", "pi+", { "pi0": [...] }], model: "PHSP", modelParams: [] }] }`
 */
export function buildDecayChain(registry: DecayRegistry, root: ParticleName, options: ChainOptions = {}): DecayChain {
  return toChain(resolveChain(registry, root, options));
}

function toChain(node: DecayNode): DecayChain {
  return {
    [node.particle]: node.channels.map((ch) => ({
      bf: ch.fraction,
      fs: ch.products.map((p) => (p.stable ? p.particle : toChain(p))),
      model: ch.model,
      modelParams: ch.modelParams,
    })),
  };
}
