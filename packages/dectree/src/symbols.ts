import {
  AliasChainError,
  ConflictingConjugateError,
  DuplicateAliasError,
  NoConjugateError,
} from "./errors.js";
import { createParticleLookup, type ParticleLookup } from "./particles.js";
import type { ParticleName } from "./types.js";

/**
 * Aliases and charge-conjugate pairs of one decay file.
 *
 * Registrations are write-once per name: repeating an identical
 * registration is a no-op, a conflicting one throws.
 */
export class SymbolTable {
  private readonly aliasMap = new Map<ParticleName, ParticleName>();
  private readonly conjugates = new Map<ParticleName, ParticleName>();
  /** Explicit pairs in declaration order, as written */
  private readonly pairs: Array<[ParticleName, ParticleName]> = [];

  constructor(private readonly lookup: ParticleLookup = createParticleLookup()) {}

  registerAlias(alias: ParticleName, target: ParticleName, line?: number): void {
    const existing = this.aliasMap.get(alias);
    if (existing !== undefined) {
      if (existing === target) return;
      throw new DuplicateAliasError(alias, existing, target, line);
    }
    if (this.aliasMap.has(target)) {
      throw new AliasChainError(alias, target, line);
    }
    for (const [other, otherTarget] of this.aliasMap) {
      if (otherTarget === alias) throw new AliasChainError(other, alias, line);
    }
    this.aliasMap.set(alias, target);
  }

  registerChargeConj(a: ParticleName, b: ParticleName, line?: number): void {
    const partnerOfA = this.conjugates.get(a);
    const partnerOfB = this.conjugates.get(b);
    if (partnerOfA === b && partnerOfB === a) return;
    if (partnerOfA !== undefined) throw new ConflictingConjugateError(a, partnerOfA, b, line);
    if (partnerOfB !== undefined) throw new ConflictingConjugateError(b, partnerOfB, a, line);
    this.conjugates.set(a, b);
    this.conjugates.set(b, a);
    this.pairs.push([a, b]);
  }

  /** Canonical particle behind an alias; the name itself when unaliased. */
  resolve(name: ParticleName): ParticleName {
    return this.aliasMap.get(name) ?? name;
  }

  isAlias(name: ParticleName): boolean {
    return this.aliasMap.has(name);
  }

  /**
   * Charge conjugate of `name`: an explicit `ChargeConj` partner, else the
   * name itself when its canonical particle is self-conjugate, else the
   * lookup's antiparticle (real particle names only; an alias has no
   * implied partner).
   */
  conjugateOf(name: ParticleName): ParticleName {
    const explicit = this.conjugates.get(name);
    if (explicit !== undefined) return explicit;
    if (this.lookup.isSelfConjugate(this.resolve(name))) return name;
    if (!this.isAlias(name)) {
      const anti = this.lookup.defaultAntiparticle(name);
      if (anti !== undefined) return anti;
    }
    throw new NoConjugateError(name);
  }

  hasConjugate(name: ParticleName): boolean {
    return (
      this.conjugates.has(name) ||
      this.lookup.isSelfConjugate(this.resolve(name)) ||
      (!this.isAlias(name) && this.lookup.defaultAntiparticle(name) !== undefined)
    );
  }

  /** alias → canonical particle, in declaration order */
  aliases(): Record<ParticleName, ParticleName> {
    return Object.fromEntries(this.aliasMap);
  }

  /** Explicit ChargeConj pairs as written: particle → conjugate */
  chargeConjugates(): Record<ParticleName, ParticleName> {
    return Object.fromEntries(this.pairs);
  }
}
