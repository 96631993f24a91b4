/**
 * Statement parser for .dec decay files.
 *
 * Turns the lexer's statements into typed `Declaration`s. Names are not
 * resolved here; the only context used is the set of aliases and `Define`d
 * constants of the whole file, collected up front, so that model detection
 * and parameter substitution do not depend on declaration order.
 */
import { tokenMatcher, type IToken } from "chevrotain";
import {
  AliasKw,
  CDecayKw,
  ChargeConjKw,
  DecayKw,
  DefineKw,
  EndKw,
  EnddecayKw,
  NoPhotosKw,
  NumberLiteral,
  PhotosFlag,
  PythiaParamKw,
  SetLineshapePWKw,
  YesPhotosKw,
  tokenizeStatements,
  type Statement,
} from "./lexer.js";
import {
  DecSyntaxError,
  InvalidFractionError,
  InvalidModelParamError,
  MissingModelError,
  NestedDecayError,
  UnterminatedDecayError,
} from "../errors.js";
import { knownModels, MODEL_NAME_PATTERN } from "../models.js";
import { createParticleLookup, type ParticleLookup } from "../particles.js";
import type { DecayChannel, Declaration, ParticleName } from "../types.js";

export type StatementParserOptions = {
  /** Extra decay model names, on top of the bundled table */
  models?: Iterable<string>;
  /** Used to reject known particle names as fallback model names */
  lookup?: ParticleLookup;
};

type ParseContext = {
  models: ReadonlySet<string>;
  lookup: ParticleLookup;
  aliases: ReadonlySet<string>;
  defines: ReadonlyMap<string, number>;
};

// ── Token helpers ───────────────────────────────────────────────────────────

function pos(token: IToken) {
  return { line: token.startLine ?? 1, column: token.startColumn ?? 1 };
}

function isNumber(token: IToken): boolean {
  return tokenMatcher(token, NumberLiteral);
}

function expectArgs(keyword: IToken, args: IToken[], count: number, usage: string): void {
  if (args.length !== count) {
    throw new DecSyntaxError(`${keyword.image} expects ${usage}, got ${args.length} argument(s)`, pos(keyword));
  }
}

function numericValue(token: IToken): number | undefined {
  return isNumber(token) ? Number(token.image) : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════════════════

/** Lex and parse decay-file text into declarations. */
export function parseDeclarations(text: string, options: StatementParserOptions = {}): Declaration[] {
  return parseStatements(tokenizeStatements(text).statements, options);
}

/**
 * Parse lexer statements into declarations, in source order.
 *
 * A `Decay ... Enddecay` region becomes one `decay` declaration carrying its
 * channels. Statements after `End` are ignored.
 */
export function parseStatements(statements: Statement[], options: StatementParserOptions = {}): Declaration[] {
  const models = new Set(knownModels());
  for (const m of options.models ?? []) models.add(m);
  const ctx: ParseContext = {
    models,
    lookup: options.lookup ?? createParticleLookup(),
    ...collectNames(statements),
  };

  const declarations: Declaration[] = [];
  let open: { particle: ParticleName; line: number; channels: DecayChannel[] } | undefined;

  for (const st of statements) {
    if (st.kind === "channel") {
      if (!open) {
        throw new DecSyntaxError("Decay channel outside a Decay block", pos(st.tokens[0]));
      }
      open.channels.push(parseChannel(st, ctx));
      continue;
    }

    const [keyword, ...args] = st.tokens;
    const line = st.line;

    if (tokenMatcher(keyword, DecayKw)) {
      expectArgs(keyword, args, 1, "a particle name");
      if (open) throw new NestedDecayError(args[0].image, open.particle, line);
      open = { particle: args[0].image, line, channels: [] };
      continue;
    }
    if (tokenMatcher(keyword, EnddecayKw)) {
      if (!open) throw new DecSyntaxError("Enddecay without a matching Decay", pos(keyword));
      expectArgs(keyword, args, 0, "no arguments");
      declarations.push({ kind: "decay", particle: open.particle, channels: open.channels, line: open.line });
      open = undefined;
      continue;
    }
    if (tokenMatcher(keyword, EndKw)) {
      if (open) throw new UnterminatedDecayError(open.particle, open.line);
      declarations.push({ kind: "end", line });
      return declarations;
    }
    if (open) {
      throw new DecSyntaxError(`"${keyword.image}" is not allowed inside "Decay ${open.particle}"`, pos(keyword));
    }
    declarations.push(parseDeclaration(keyword, args, line));
  }

  if (open) throw new UnterminatedDecayError(open.particle, open.line);
  return declarations;
}

// ═══════════════════════════════════════════════════════════════════════════
//  Declarations
// ═══════════════════════════════════════════════════════════════════════════

/** Aliases and constants of the whole file, needed before any channel is read */
function collectNames(statements: Statement[]): Pick<ParseContext, "aliases" | "defines"> {
  const aliases = new Set<string>();
  const defines = new Map<string, number>();
  for (const st of statements) {
    if (st.kind !== "declaration" || st.tokens.length !== 3) continue;
    const [keyword, name, value] = st.tokens;
    if (tokenMatcher(keyword, AliasKw)) aliases.add(name.image);
    if (tokenMatcher(keyword, DefineKw)) {
      const n = numericValue(value);
      if (n !== undefined) defines.set(name.image, n);
    }
  }
  return { aliases, defines };
}

function parseDeclaration(keyword: IToken, args: IToken[], line: number): Declaration {
  if (tokenMatcher(keyword, AliasKw)) {
    expectArgs(keyword, args, 2, "<alias> <particle>");
    return { kind: "alias", name: args[0].image, target: args[1].image, line };
  }
  if (tokenMatcher(keyword, ChargeConjKw)) {
    expectArgs(keyword, args, 2, "<particle> <conjugate>");
    return { kind: "chargeConj", particle: args[0].image, conjugate: args[1].image, line };
  }
  if (tokenMatcher(keyword, CDecayKw)) {
    expectArgs(keyword, args, 1, "a particle name");
    return { kind: "cdecay", particle: args[0].image, line };
  }
  if (tokenMatcher(keyword, DefineKw)) {
    expectArgs(keyword, args, 2, "<name> <value>");
    const value = numericValue(args[1]);
    if (value === undefined) {
      throw new DecSyntaxError(`Define ${args[0].image}: "${args[1].image}" is not a number`, pos(args[1]));
    }
    return { kind: "define", name: args[0].image, value, line };
  }
  if (tokenMatcher(keyword, PythiaParamKw)) {
    expectArgs(keyword, args, 1, "<Key>=<value>");
    return parsePythiaParam(keyword, args[0], line);
  }
  if (tokenMatcher(keyword, SetLineshapePWKw)) {
    expectArgs(keyword, args, 4, "<mother> <daughter> <daughter> <value>");
    const value = numericValue(args[3]);
    if (value === undefined || !Number.isInteger(value)) {
      throw new DecSyntaxError(`SetLineshapePW value "${args[3].image}" is not an integer`, pos(args[3]));
    }
    return {
      kind: "lineshapePW",
      mother: args[0].image,
      daughters: [args[1].image, args[2].image],
      value,
      line,
    };
  }
  if (tokenMatcher(keyword, YesPhotosKw) || tokenMatcher(keyword, NoPhotosKw)) {
    expectArgs(keyword, args, 0, "no arguments");
    return { kind: "photos", enabled: tokenMatcher(keyword, YesPhotosKw), line };
  }
  throw new DecSyntaxError(`Unexpected "${keyword.image}" outside a Decay block`, pos(keyword));
}

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** PythiaBothParam ParticleDecays:mixB=off */
function parsePythiaParam(keyword: IToken, setting: IToken, line: number): Declaration {
  const eq = setting.image.indexOf("=");
  if (eq <= 0) {
    throw new DecSyntaxError(`${keyword.image} expects <Key>=<value>, got "${setting.image}"`, pos(setting));
  }
  const generator = keyword.image.replace(/^Pythia/, "").replace(/Param$/, "");
  if (generator !== "Both" && generator !== "Generic" && generator !== "Alias") {
    throw new DecSyntaxError(`Unknown Pythia parameter keyword "${keyword.image}"`, pos(keyword));
  }
  const raw = setting.image.slice(eq + 1);
  return {
    kind: "pythiaParam",
    generator,
    key: setting.image.slice(0, eq),
    value: NUMERIC.test(raw) ? Number(raw) : raw,
    line,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
//  Channels
// ═══════════════════════════════════════════════════════════════════════════

/**
 * `fraction daughter... [PHOTOS] MODEL [params...]`
 *
 * The model is the first known model name after at least one daughter. A
 * model missing from the table is accepted when it is the token right before
 * the trailing parameters, looks like a model name and is neither an alias
 * nor a known particle.
 */
function parseChannel(st: Statement, ctx: ParseContext): DecayChannel {
  const [fractionTok, ...rest] = st.tokens;
  const fraction = numericValue(fractionTok);
  if (fraction === undefined || !(fraction >= 0)) {
    throw new InvalidFractionError(fractionTok.image, pos(fractionTok));
  }

  const modelIndex = findModel(rest, ctx);
  if (modelIndex === undefined) {
    const text = st.tokens.map((t) => t.image).join(" ");
    throw new MissingModelError(`No decay model found in channel "${text}"`, pos(fractionTok));
  }

  const modelTok = rest[modelIndex];
  const photos = modelIndex > 0 && tokenMatcher(rest[modelIndex - 1], PhotosFlag);
  const daughterToks = rest.slice(0, photos ? modelIndex - 1 : modelIndex);
  if (daughterToks.length === 0) {
    throw new MissingModelError(`Channel with model ${modelTok.image} has no daughters`, pos(fractionTok));
  }
  const misplaced = daughterToks.find((t) => tokenMatcher(t, PhotosFlag));
  if (misplaced) {
    throw new DecSyntaxError("PHOTOS must directly precede the model name", pos(misplaced));
  }

  const modelParams = rest.slice(modelIndex + 1).map((t) => {
    const value = numericValue(t) ?? ctx.defines.get(t.image);
    if (value === undefined) throw new InvalidModelParamError(t.image, modelTok.image, pos(t));
    return value;
  });

  return {
    fraction,
    daughters: daughterToks.map((t) => t.image),
    model: modelTok.image,
    modelParams,
    photos,
    line: st.line,
  };
}

function findModel(tokens: IToken[], ctx: ParseContext): number | undefined {
  const countsAsDaughter = (t: IToken) => !tokenMatcher(t, PhotosFlag);
  let daughters = 0;
  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (daughters > 0 && ctx.models.has(t.image) && !ctx.aliases.has(t.image)) return i;
    if (countsAsDaughter(t)) daughters++;
  }

  // Fallback: the token before the trailing run of parameters
  let start = tokens.length;
  while (start > 0 && (isNumber(tokens[start - 1]) || ctx.defines.has(tokens[start - 1].image))) start--;
  const candidate = start - 1;
  if (candidate < 1) return undefined;
  const name = tokens[candidate].image;
  const hasDaughter = tokens.slice(0, candidate).some(countsAsDaughter);
  if (
    hasDaughter &&
    !tokenMatcher(tokens[candidate], PhotosFlag) &&
    MODEL_NAME_PATTERN.test(name) &&
    !ctx.aliases.has(name) &&
    !ctx.lookup.isKnown(name)
  ) {
    return candidate;
  }
  return undefined;
}
