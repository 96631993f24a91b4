/**
 * Particle name as written in a decay file: a real particle ("pi0", "K+")
 * or a file-local alias ("MyD*-"). Identity is exact string equality.
 */
export type ParticleName = string;

/**
 * One way a particle decays.
 *
 * Daughter order is the physical final-state ordering and is preserved
 * through every transformation (conjugation, serialization, queries).
 */
export type DecayChannel = {
  /** Branching fraction, non-negative */
  fraction: number;
  daughters: ParticleName[];
  /** Decay model name, e.g. "PHSP", "SVS" */
  model: string;
  /** Model parameters with `Define`d names already substituted */
  modelParams: number[];
  /** Channel carries the `PHOTOS` flag */
  photos: boolean;
  /** 1-based line of the channel's fraction token */
  line: number;
};

/**
 * All channels of one particle.
 *
 * `origin` is "decay" for a block written with `Decay ... Enddecay` and
 * "cdecay" for one generated from a `CDecay` request, in which case
 * `conjugateOf` names the source block's particle.
 */
export type DecayBlock = {
  particle: ParticleName;
  channels: DecayChannel[];
  origin: "decay" | "cdecay";
  conjugateOf?: ParticleName;
  /** 1-based line of the `Decay` / `CDecay` keyword */
  line: number;
};

// ── Declarations (statement parser output) ─────────────────────────────────

export type AliasDecl = { kind: "alias"; name: ParticleName; target: ParticleName; line: number };
export type ChargeConjDecl = { kind: "chargeConj"; particle: ParticleName; conjugate: ParticleName; line: number };
export type DefineDecl = { kind: "define"; name: string; value: number; line: number };
export type DecayDecl = { kind: "decay"; particle: ParticleName; channels: DecayChannel[]; line: number };
export type CDecayDecl = { kind: "cdecay"; particle: ParticleName; line: number };
export type PythiaParamDecl = {
  kind: "pythiaParam";
  /** Which generator instance the setting targets */
  generator: "Both" | "Generic" | "Alias";
  /** Setting key, e.g. "ParticleDecays:mixB" */
  key: string;
  value: string | number;
  line: number;
};
export type LineshapeDecl = {
  kind: "lineshapePW";
  mother: ParticleName;
  daughters: [ParticleName, ParticleName];
  /** Partial-wave value (integer) */
  value: number;
  line: number;
};
export type PhotosDecl = { kind: "photos"; enabled: boolean; line: number };
export type EndDecl = { kind: "end"; line: number };

/** Typed statement produced by the statement parser. */
export type Declaration =
  | AliasDecl
  | ChargeConjDecl
  | DefineDecl
  | DecayDecl
  | CDecayDecl
  | PythiaParamDecl
  | LineshapeDecl
  | PhotosDecl
  | EndDecl;

// ── Findings ────────────────────────────────────────────────────────────────

export type FindingSeverity = "error" | "warning" | "info";

export type FindingCode =
  | "OVER_UNITY"
  | "UNRESOLVED_PARTICLE"
  | "REDUNDANT_CDECAY"
  | "UNCONJUGATED_DAUGHTER";

/** Non-fatal result of validation. Callers decide what severity means to them. */
export type Finding = {
  code: FindingCode;
  severity: FindingSeverity;
  particle: ParticleName;
  message: string;
  /** 1-based source line, where one applies */
  line?: number;
  /** Channel fraction sum (OVER_UNITY only) */
  sum?: number;
};

// ── Query results ───────────────────────────────────────────────────────────

/**
 * Resolved view of a particle's decay tree.
 * Particles without a block (or treated as stable) have no channels.
 */
export type DecayNode = {
  particle: ParticleName;
  stable: boolean;
  channels: DecayNodeChannel[];
};

export type DecayNodeChannel = {
  fraction: number;
  daughters: ParticleName[];
  model: string;
  modelParams: number[];
  photos: boolean;
  /** One node per daughter, same order as `daughters` */
  products: DecayNode[];
};

/** A fully expanded path of the decay tree. */
export type FinalState = {
  /** Product of the branching fractions along the path */
  fraction: number;
  particles: ParticleName[];
};

/** Compact nested chain: `{ mother: [{ bf, fs, model, modelParams }] }` */
export type DecayChain = {
  [mother: ParticleName]: DecayChainMode[];
};

export type DecayChainMode = {
  bf: number;
  fs: Array<ParticleName | DecayChain>;
  model: string;
  modelParams: number[];
};
