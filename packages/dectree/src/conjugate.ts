import {
  DuplicateDecayBlockError,
  MissingSourceDecayError,
  NoConjugateError,
  UnknownConjugateTargetError,
} from "./errors.js";
import type { DecayRegistry } from "./registry.js";
import type { SymbolTable } from "./symbols.js";
import type { CDecayDecl, DecayBlock, Finding, ParticleName } from "./types.js";

/**
 * Mirror `source` into the decay block of `particle`.
 *
 * Fractions, models, parameters, PHOTOS flags and channel order are kept;
 * every daughter is replaced by `conjugate(daughter)`.
 */
export function conjugateBlock(
  source: DecayBlock,
  particle: ParticleName,
  conjugate: (name: ParticleName) => ParticleName,
  line: number = source.line,
): DecayBlock {
  return {
    particle,
    origin: "cdecay",
    conjugateOf: source.particle,
    line,
    channels: source.channels.map((ch) => ({
      ...ch,
      daughters: ch.daughters.map(conjugate),
      modelParams: [...ch.modelParams],
    })),
  };
}

export type ConjugateGeneration = {
  /** Generated blocks, in CDecay order */
  blocks: DecayBlock[];
  findings: Finding[];
};

/**
 * Build the blocks requested by `CDecay` statements.
 *
 * `declared` must hold every `Decay` block of the file; only those serve as
 * sources. A CDecay for a particle that also has its own `Decay` block is
 * skipped with a REDUNDANT_CDECAY warning. Daughters with no known conjugate
 * keep their name and are reported once each as UNCONJUGATED_DAUGHTER.
 */
export function generateConjugateDecays(
  requests: CDecayDecl[],
  declared: DecayRegistry,
  symbols: SymbolTable,
): ConjugateGeneration {
  const blocks: DecayBlock[] = [];
  const findings: Finding[] = [];
  const requested = new Map<ParticleName, number>();
  const unconjugated = new Set<ParticleName>();

  for (const req of requests) {
    const previous = requested.get(req.particle);
    if (previous !== undefined) throw new DuplicateDecayBlockError(req.particle, previous, req.line);
    requested.set(req.particle, req.line);

    const explicit = declared.get(req.particle);
    if (explicit) {
      findings.push({
        code: "REDUNDANT_CDECAY",
        severity: "warning",
        particle: req.particle,
        line: req.line,
        message: `"${req.particle}" has both "Decay" (line ${explicit.line}) and "CDecay"; the CDecay is ignored`,
      });
      continue;
    }

    const sourceName = sourceOf(req, symbols);
    const source = declared.get(sourceName);
    if (!source) throw new MissingSourceDecayError(req.particle, sourceName, req.line);

    const conjugate = (name: ParticleName): ParticleName => {
      if (symbols.hasConjugate(name)) return symbols.conjugateOf(name);
      if (!unconjugated.has(name)) {
        unconjugated.add(name);
        findings.push({
          code: "UNCONJUGATED_DAUGHTER",
          severity: "warning",
          particle: name,
          line: req.line,
          message: `No charge conjugate known for "${name}" in "CDecay ${req.particle}"; kept as is`,
        });
      }
      return name;
    };
    blocks.push(conjugateBlock(source, req.particle, conjugate, req.line));
  }

  return { blocks, findings };
}

function sourceOf(req: CDecayDecl, symbols: SymbolTable): ParticleName {
  try {
    return symbols.conjugateOf(req.particle);
  } catch (err) {
    if (err instanceof NoConjugateError) throw new UnknownConjugateTargetError(req.particle, req.line, err);
    throw err;
  }
}
