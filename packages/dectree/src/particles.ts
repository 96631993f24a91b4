/**
 * Particle-property lookup used for charge conjugation and stability.
 *
 * The library only needs three facts about a real particle; any particle
 * database can be plugged in by implementing `ParticleLookup`.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ParticleName } from "./types.js";

export interface ParticleLookup {
  /** Particle is its own antiparticle (gamma, pi0, J/psi, ...) */
  isSelfConjugate(name: ParticleName): boolean;
  /** Antiparticle name, when the particle has a distinct one */
  defaultAntiparticle(name: ParticleName): ParticleName | undefined;
  /** Particle is known to the lookup at all */
  isKnown(name: ParticleName): boolean;
}

export type ParticleTable = {
  selfConjugate: ParticleName[];
  /** [particle, antiparticle] pairs; both directions are looked up */
  pairs: Array<[ParticleName, ParticleName]>;
  /** Particles treated as stable final-state leaves */
  stable: ParticleName[];
};

const ParticleTableSchema = z.object({
  selfConjugate: z.array(z.string()),
  pairs: z.array(z.tuple([z.string(), z.string()])),
  stable: z.array(z.string()),
});

let bundledTable: ParticleTable | undefined;

/** The particle table shipped in `data/particles.json` (read once). */
export function loadParticleTable(): ParticleTable {
  if (!bundledTable) {
    const text = readFileSync(new URL("../data/particles.json", import.meta.url), "utf8");
    bundledTable = ParticleTableSchema.parse(JSON.parse(text));
  }
  return bundledTable;
}

/** Stable particles of the bundled table. */
export function defaultStableParticles(): ReadonlySet<ParticleName> {
  return new Set(loadParticleTable().stable);
}

/**
 * Build a `ParticleLookup` over a particle table (the bundled one by default).
 */
export function createParticleLookup(table: ParticleTable = loadParticleTable()): ParticleLookup {
  const selfConjugate = new Set(table.selfConjugate);
  const anti = new Map<ParticleName, ParticleName>();
  for (const [particle, antiparticle] of table.pairs) {
    anti.set(particle, antiparticle);
    anti.set(antiparticle, particle);
  }
  const stable = new Set(table.stable);

  return {
    isSelfConjugate: (name) => selfConjugate.has(name),
    defaultAntiparticle: (name) => anti.get(name),
    isKnown: (name) => selfConjugate.has(name) || anti.has(name) || stable.has(name),
  };
}
