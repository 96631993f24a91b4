import type { ParticleName } from "./types.js";

export type DecErrorCode =
  | "LEX_ERROR"
  | "SYNTAX_ERROR"
  | "NESTED_DECAY"
  | "UNTERMINATED_DECAY"
  | "INVALID_FRACTION"
  | "INVALID_MODEL_PARAM"
  | "MISSING_MODEL"
  | "DUPLICATE_ALIAS"
  | "ALIAS_CHAIN"
  | "CONFLICTING_CONJUGATE"
  | "NO_CONJUGATE"
  | "UNKNOWN_CONJUGATE_TARGET"
  | "MISSING_SOURCE_DECAY"
  | "DUPLICATE_DECAY_BLOCK"
  | "REGISTRY_FROZEN"
  | "UNKNOWN_PARTICLE"
  | "DEPTH_EXCEEDED";

export type SourcePosition = {
  /** 1-based line */
  line?: number;
  /** 1-based column */
  column?: number;
};

/**
 * Base class of every error thrown by dectree.
 *
 * Messages carry a "Line N: " prefix when a source line is known, so that a
 * plain `err.message` is enough to locate the problem.
 */
export class DecError extends Error {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(
    public readonly code: DecErrorCode,
    message: string,
    position: SourcePosition = {},
    options?: { cause?: unknown },
  ) {
    super(position.line != null ? `Line ${position.line}: ${message}` : message, options);
    this.name = "DecError";
    this.line = position.line;
    this.column = position.column;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.line !== undefined ? { line: this.line } : {}),
      ...(this.column !== undefined ? { column: this.column } : {}),
    };
  }
}

// ── Lexical ─────────────────────────────────────────────────────────────────

export class LexError extends DecError {
  constructor(message: string, position: SourcePosition) {
    super("LEX_ERROR", message, position);
    this.name = "LexError";
  }
}

// ── Syntax ──────────────────────────────────────────────────────────────────

export class DecSyntaxError extends DecError {
  constructor(message: string, position: SourcePosition) {
    super("SYNTAX_ERROR", message, position);
    this.name = "DecSyntaxError";
  }
}

export class NestedDecayError extends DecError {
  constructor(
    public readonly particle: ParticleName,
    public readonly openParticle: ParticleName,
    line: number,
  ) {
    super("NESTED_DECAY", `"Decay ${particle}" opened while "Decay ${openParticle}" is still open`, { line });
    this.name = "NestedDecayError";
  }
}

export class UnterminatedDecayError extends DecError {
  constructor(public readonly particle: ParticleName, line: number) {
    super("UNTERMINATED_DECAY", `"Decay ${particle}" has no matching Enddecay`, { line });
    this.name = "UnterminatedDecayError";
  }
}

export class InvalidFractionError extends DecError {
  constructor(public readonly token: string, position: SourcePosition) {
    super("INVALID_FRACTION", `"${token}" is not a valid branching fraction`, position);
    this.name = "InvalidFractionError";
  }
}

export class InvalidModelParamError extends DecError {
  constructor(
    public readonly token: string,
    public readonly model: string,
    position: SourcePosition,
  ) {
    super("INVALID_MODEL_PARAM", `"${token}" is not a number or a defined constant (model ${model})`, position);
    this.name = "InvalidModelParamError";
  }
}

export class MissingModelError extends DecError {
  constructor(message: string, position: SourcePosition) {
    super("MISSING_MODEL", message, position);
    this.name = "MissingModelError";
  }
}

// ── Symbolic ────────────────────────────────────────────────────────────────

export class DuplicateAliasError extends DecError {
  constructor(
    public readonly alias: ParticleName,
    public readonly existing: ParticleName,
    public readonly attempted: ParticleName,
    line?: number,
  ) {
    super("DUPLICATE_ALIAS", `Alias "${alias}" already points to "${existing}", cannot point it to "${attempted}"`, { line });
    this.name = "DuplicateAliasError";
  }
}

export class AliasChainError extends DecError {
  constructor(
    public readonly alias: ParticleName,
    public readonly target: ParticleName,
    line?: number,
  ) {
    super("ALIAS_CHAIN", `Alias "${alias}" cannot target "${target}", which is itself an alias`, { line });
    this.name = "AliasChainError";
  }
}

export class ConflictingConjugateError extends DecError {
  constructor(
    public readonly particle: ParticleName,
    public readonly existing: ParticleName,
    public readonly attempted: ParticleName,
    line?: number,
  ) {
    super(
      "CONFLICTING_CONJUGATE",
      `"${particle}" is already charge-conjugate to "${existing}", cannot pair it with "${attempted}"`,
      { line },
    );
    this.name = "ConflictingConjugateError";
  }
}

export class NoConjugateError extends DecError {
  constructor(public readonly particle: ParticleName) {
    super("NO_CONJUGATE", `No charge conjugate known for "${particle}"`);
    this.name = "NoConjugateError";
  }
}

export class UnknownConjugateTargetError extends DecError {
  constructor(public readonly particle: ParticleName, line: number, cause?: unknown) {
    super(
      "UNKNOWN_CONJUGATE_TARGET",
      `"CDecay ${particle}": no charge-conjugate partner for "${particle}" (declare one with ChargeConj)`,
      { line },
      { cause },
    );
    this.name = "UnknownConjugateTargetError";
  }
}

export class MissingSourceDecayError extends DecError {
  constructor(
    public readonly particle: ParticleName,
    public readonly source: ParticleName,
    line: number,
  ) {
    super("MISSING_SOURCE_DECAY", `"CDecay ${particle}" needs a "Decay ${source}" block, none was declared`, { line });
    this.name = "MissingSourceDecayError";
  }
}

export class DuplicateDecayBlockError extends DecError {
  constructor(
    public readonly particle: ParticleName,
    public readonly firstLine: number,
    line: number,
  ) {
    super("DUPLICATE_DECAY_BLOCK", `Decays of "${particle}" already defined at line ${firstLine}`, { line });
    this.name = "DuplicateDecayBlockError";
  }
}

export class RegistryFrozenError extends DecError {
  constructor(particle: ParticleName) {
    super("REGISTRY_FROZEN", `Cannot register decays of "${particle}": registry is frozen`);
    this.name = "RegistryFrozenError";
  }
}

// ── Query-time ──────────────────────────────────────────────────────────────

export class UnknownParticleError extends DecError {
  constructor(public readonly particle: ParticleName) {
    super("UNKNOWN_PARTICLE", `Decays of particle "${particle}" not found`);
    this.name = "UnknownParticleError";
  }
}

export class DepthExceededError extends DecError {
  constructor(
    public readonly particle: ParticleName,
    public readonly maxDepth: number,
  ) {
    super("DEPTH_EXCEEDED", `Decay chain exceeds ${maxDepth} levels at "${particle}"`);
    this.name = "DepthExceededError";
  }
}
