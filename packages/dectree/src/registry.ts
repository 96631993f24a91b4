import { DuplicateDecayBlockError, RegistryFrozenError } from "./errors.js";
import type { DecayBlock, DecayChannel, ParticleName } from "./types.js";

function freezeChannel(channel: DecayChannel): DecayChannel {
  const daughters = [...channel.daughters];
  const modelParams = [...channel.modelParams];
  Object.freeze(daughters);
  Object.freeze(modelParams);
  return Object.freeze({ ...channel, daughters, modelParams });
}

function freezeBlock(block: DecayBlock): DecayBlock {
  const channels = block.channels.map(freezeChannel);
  Object.freeze(channels);
  return Object.freeze({ ...block, channels });
}

/**
 * Particle name → decay block, in registration order.
 *
 * Blocks are copied and frozen on the way in. After `freeze()` every
 * `register` call throws.
 */
export class DecayRegistry {
  private readonly blocks = new Map<ParticleName, DecayBlock>();
  private frozen = false;

  register(block: DecayBlock): void {
    if (this.frozen) throw new RegistryFrozenError(block.particle);
    const existing = this.blocks.get(block.particle);
    if (existing) throw new DuplicateDecayBlockError(block.particle, existing.line, block.line);
    this.blocks.set(block.particle, freezeBlock(block));
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get(particle: ParticleName): DecayBlock | undefined {
    return this.blocks.get(particle);
  }

  has(particle: ParticleName): boolean {
    return this.blocks.has(particle);
  }

  get size(): number {
    return this.blocks.size;
  }

  /** Mother names in registration order */
  names(): ParticleName[] {
    return [...this.blocks.keys()];
  }

  values(): DecayBlock[] {
    return [...this.blocks.values()];
  }

  [Symbol.iterator](): IterableIterator<[ParticleName, DecayBlock]> {
    return this.blocks.entries();
  }
}
