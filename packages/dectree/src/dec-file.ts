import { SpanStatusCode } from "@opentelemetry/api";
import {
  buildDecayChain,
  enumerateFinalStates,
  resolveChain,
  DEFAULT_MAX_DEPTH,
  type ChainOptions,
} from "./chain.js";
import { generateConjugateDecays } from "./conjugate.js";
import { DecError, UnknownParticleError } from "./errors.js";
import { tokenizeStatements } from "./parser/lexer.js";
import { parseStatements } from "./parser/parser.js";
import { createParticleLookup, type ParticleLookup } from "./particles.js";
import { DecayRegistry } from "./registry.js";
import { SymbolTable } from "./symbols.js";
import {
  otelTracer,
  parseCounter,
  parseDurationHistogram,
  parseErrorCounter,
  roundMs,
  silentLogger,
  type Logger,
} from "./telemetry.js";
import type {
  CDecayDecl,
  DecayBlock,
  DecayChain,
  DecayNode,
  FinalState,
  Finding,
  FindingSeverity,
  ParticleName,
} from "./types.js";
import { validate } from "./validator.js";

export type DecOptions = {
  /**
   * Structured logger for parse events (declaration counts, generated
   * conjugate decays, findings). Accepts pino, winston, `console`, or any
   * logger with `debug`, `info`, `warn` and `error` methods.
   * Defaults to silent no-ops.
   */
  logger?: Logger;
  /** Particle database used for charge conjugation. Default: bundled table */
  lookup?: ParticleLookup;
  /** Decay model names in addition to the bundled table */
  models?: Iterable<string>;
  /** Particles the validator accepts as leaves. Default: bundled stable list */
  stableParticles?: Iterable<ParticleName>;
  /** Tolerance on branching-fraction sums. Default 1e-6 */
  epsilon?: number;
  /** Severity of OVER_UNITY findings. Default "warning" */
  overUnitySeverity?: FindingSeverity;
  /**
   * Generate the blocks requested with `CDecay`. Default true.
   * Without them the registry is missing every antiparticle decay that the
   * file only defines by conjugation.
   */
  includeConjugateDecays?: boolean;
  /** Default depth bound for chain queries. Default 1000 */
  maxDepth?: number;
};

export type PythiaSetting = {
  generator: "Both" | "Generic" | "Alias";
  key: string;
  value: string | number;
};

export type LineshapeSetting = {
  mother: ParticleName;
  daughters: [ParticleName, ParticleName];
  value: number;
};

type DecFileParts = {
  registry: DecayRegistry;
  symbols: SymbolTable;
  findings: Finding[];
  definitions: Map<string, number>;
  pythiaSettings: PythiaSetting[];
  lineshapeSettings: LineshapeSetting[];
  globalPhotos: boolean | undefined;
  cdecays: CDecayDecl[];
  maxDepth: number;
};

/**
 * A parsed, resolved and validated decay file.
 *
 * Read-only. Blocks from `getDecayBlock` are the registry's frozen objects;
 * every other query returns fresh data.
 */
export class DecFile {
  readonly registry: DecayRegistry;
  readonly findings: readonly Finding[];

  constructor(private readonly parts: DecFileParts) {
    this.registry = parts.registry;
    this.findings = Object.freeze([...parts.findings]);
  }

  get numberOfDecays(): number {
    return this.registry.size;
  }

  /** Findings with severity "error" */
  get errors(): Finding[] {
    return this.findings.filter((f) => f.severity === "error");
  }

  /** `Define` constants: name → value */
  get definitions(): Record<string, number> {
    return Object.fromEntries(this.parts.definitions);
  }

  /** alias → canonical particle */
  get aliases(): Record<ParticleName, ParticleName> {
    return this.parts.symbols.aliases();
  }

  /** Explicit `ChargeConj` pairs: particle → conjugate, as written */
  get chargeConjugates(): Record<ParticleName, ParticleName> {
    return this.parts.symbols.chargeConjugates();
  }

  /** Pythia settings keyed by setting name; the last declaration of a key wins */
  get pythiaDefinitions(): Record<string, string | number> {
    return Object.fromEntries(this.parts.pythiaSettings.map((s) => [s.key, s.value]));
  }

  get pythiaSettings(): PythiaSetting[] {
    return this.parts.pythiaSettings.map((s) => ({ ...s }));
  }

  get lineshapeDefinitions(): LineshapeSetting[] {
    return this.parts.lineshapeSettings.map((s) => ({ ...s, daughters: [s.daughters[0], s.daughters[1]] }));
  }

  /** Global PHOTOS flag (`yesPhotos` / `noPhotos`); false when not set */
  get globalPhotos(): boolean {
    return this.parts.globalPhotos ?? false;
  }

  /** Global PHOTOS flag as declared, undefined when the file does not set it */
  get declaredPhotos(): boolean | undefined {
    return this.parts.globalPhotos;
  }

  /** Particles named in `CDecay` statements, sorted */
  get chargeConjugateDecays(): ParticleName[] {
    return this.parts.cdecays.map((c) => c.particle).sort();
  }

  /** `CDecay` targets in file order */
  get conjugateDecayRequests(): ParticleName[] {
    return this.parts.cdecays.map((c) => c.particle);
  }

  /** Canonical particle behind an alias */
  resolveName(name: ParticleName): ParticleName {
    return this.parts.symbols.resolve(name);
  }

  conjugateOf(name: ParticleName): ParticleName {
    return this.parts.symbols.conjugateOf(name);
  }

  listDecayMotherNames(): ParticleName[] {
    return this.registry.names();
  }

  getDecayBlock(mother: ParticleName): DecayBlock {
    const block = this.registry.get(mother);
    if (!block) throw new UnknownParticleError(mother);
    return block;
  }

  /** Daughter lists of each channel of `mother` */
  listDecayModes(mother: ParticleName): ParticleName[][] {
    return this.getDecayBlock(mother).channels.map((ch) => [...ch.daughters]);
  }

  resolveChain(root: ParticleName, options: ChainOptions = {}): DecayNode {
    return resolveChain(this.registry, root, this.chainOptions(options));
  }

  enumerateFinalStates(root: ParticleName, options: ChainOptions = {}): Iterable<FinalState> {
    return enumerateFinalStates(this.registry, root, this.chainOptions(options));
  }

  buildDecayChain(root: ParticleName, options: ChainOptions = {}): DecayChain {
    return buildDecayChain(this.registry, root, this.chainOptions(options));
  }

  toString(): string {
    return `<DecFile: n_decays=${this.numberOfDecays}>`;
  }

  private chainOptions(options: ChainOptions): ChainOptions {
    return { ...options, maxDepth: options.maxDepth ?? this.parts.maxDepth };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
//  Build
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse, resolve and validate a decay file.
 *
 * Atomic: returns a complete DecFile or throws a `DecError`; no partial
 * registry is ever returned. Validation problems are reported as findings.
 */
export function parseDecFile(text: string, options: DecOptions = {}): DecFile {
  const logger = options.logger ?? silentLogger;
  return otelTracer.startActiveSpan("dectree.parse", (span) => {
    const wallStart = performance.now();
    try {
      const decFile = build(text, options, logger);
      span.setAttributes({
        "dectree.decays": decFile.numberOfDecays,
        "dectree.findings": decFile.findings.length,
      });
      parseCounter.add(1);
      return decFile;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      parseErrorCounter.add(1, { "dectree.error": err instanceof DecError ? err.code : "INTERNAL" });
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      logger.error("[dectree] parse failed: %s", error.message);
      throw err;
    } finally {
      parseDurationHistogram.record(roundMs(performance.now() - wallStart));
      span.end();
    }
  });
}

function build(text: string, options: DecOptions, logger: Logger): DecFile {
  const lookup = options.lookup ?? createParticleLookup();
  const stream = tokenizeStatements(text);
  const declarations = parseStatements(stream.statements, { models: options.models, lookup });
  logger.debug("[dectree] %d statements, %d declarations", stream.statements.length, declarations.length);

  // Pass 1: register everything the file declares
  const symbols = new SymbolTable(lookup);
  const registry = new DecayRegistry();
  const definitions = new Map<string, number>();
  const pythiaSettings: PythiaSetting[] = [];
  const lineshapeSettings: LineshapeSetting[] = [];
  const cdecays: CDecayDecl[] = [];
  let globalPhotos: boolean | undefined;

  for (const decl of declarations) {
    switch (decl.kind) {
      case "alias":
        symbols.registerAlias(decl.name, decl.target, decl.line);
        break;
      case "chargeConj":
        symbols.registerChargeConj(decl.particle, decl.conjugate, decl.line);
        break;
      case "define": {
        const previous = definitions.get(decl.name);
        if (previous !== undefined && previous !== decl.value) {
          logger.warn("[dectree] line %d: %s redefined from %s to %s", decl.line, decl.name, previous, decl.value);
        }
        definitions.set(decl.name, decl.value);
        break;
      }
      case "decay":
        registry.register({ particle: decl.particle, channels: decl.channels, origin: "decay", line: decl.line });
        break;
      case "cdecay":
        cdecays.push(decl);
        break;
      case "pythiaParam":
        pythiaSettings.push({ generator: decl.generator, key: decl.key, value: decl.value });
        break;
      case "lineshapePW":
        lineshapeSettings.push({ mother: decl.mother, daughters: decl.daughters, value: decl.value });
        break;
      case "photos":
        if (globalPhotos !== undefined) {
          logger.warn("[dectree] line %d: PHOTOS flag re-set, using the last one", decl.line);
        }
        globalPhotos = decl.enabled;
        break;
      case "end":
        break;
    }
  }

  // Pass 2: conjugate decays, then validation
  const findings: Finding[] = [];
  const declaredCount = registry.size;
  if (options.includeConjugateDecays ?? true) {
    const generated = generateConjugateDecays(cdecays, registry, symbols);
    for (const block of generated.blocks) registry.register(block);
    findings.push(...generated.findings);
  } else if (cdecays.length > 0) {
    logger.debug("[dectree] skipping %d CDecay request(s)", cdecays.length);
  }
  registry.freeze();

  findings.push(
    ...validate(registry, symbols, {
      epsilon: options.epsilon,
      overUnitySeverity: options.overUnitySeverity,
      stableParticles: options.stableParticles,
    }),
  );
  for (const f of findings) {
    if (f.severity === "error") logger.error("[dectree] %s", f.message);
    else if (f.severity === "warning") logger.warn("[dectree] %s", f.message);
  }
  logger.info(
    "[dectree] %d decays (%d from CDecay), %d findings",
    registry.size,
    registry.size - declaredCount,
    findings.length,
  );

  return new DecFile({
    registry,
    symbols,
    findings,
    definitions,
    pythiaSettings,
    lineshapeSettings,
    globalPhotos,
    cdecays,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
//  Diagnostics
// ═══════════════════════════════════════════════════════════════════════════

export type DecDiagnostic = {
  message: string;
  severity: FindingSeverity;
  /** DecError code or finding code */
  code: string;
  /** 0-based positions */
  range: {
    start: { line: number; character: number };
    end:   { line: number; character: number };
  };
};

export type DecParseResult = {
  /** Undefined when a fatal error stopped the build */
  decFile: DecFile | undefined;
  diagnostics: DecDiagnostic[];
};

function lineRange(line: number | undefined, column?: number) {
  const l = Math.max((line ?? 1) - 1, 0);
  const c = Math.max((column ?? 1) - 1, 0);
  return { start: { line: l, character: c }, end: { line: l, character: 999 } };
}

/**
 * Parse a decay file and report every problem as a diagnostic instead of
 * throwing.
 */
export function parseDecDiagnostics(text: string, options: DecOptions = {}): DecParseResult {
  try {
    const decFile = parseDecFile(text, options);
    const diagnostics = decFile.findings.map((f) => ({
      message: f.message,
      severity: f.severity,
      code: f.code,
      range: lineRange(f.line),
    }));
    return { decFile, diagnostics };
  } catch (err) {
    if (!(err instanceof DecError)) throw err;
    return {
      decFile: undefined,
      diagnostics: [
        {
          message: err.message.replace(/^Line \d+:\s*/, ""),
          severity: "error",
          code: err.code,
          range: lineRange(err.line, err.column),
        },
      ],
    };
  }
}
