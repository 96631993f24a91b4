/**
 * Chevrotain Lexer for .dec decay files.
 *
 * Tokenizes decay-file text and groups the tokens into statements:
 * declarations end at a newline, decay channels end at `;` and may span
 * several lines.
 */
import { createToken, Lexer, tokenMatcher, type IToken, type TokenType } from "chevrotain";
import { LexError } from "../errors.js";

// ── Whitespace & comments ──────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r\n|\r|\n/,
  line_breaks: true,
});

export const WS = createToken({
  name: "WS",
  pattern: /[ \t\f\v]+/,
  group: Lexer.SKIPPED,
});

export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\r\n]*/,
  group: Lexer.SKIPPED,
});

// ── Labels (defined first, keywords reference them via longer_alt) ─────────

/** Particle names, model names, constants, Pythia settings: D*-, D'_10, K_S0, ParticleDecays:mixB=off */
export const Label = createToken({
  name: "Label",
  pattern: /[\w+\-*'~()\/.:=,!<>[\]{}|&^%$@?"`\\]+/,
});

// ── Keywords ───────────────────────────────────────────────────────────────

export const AliasKw          = createToken({ name: "AliasKw",          pattern: /Alias/,          longer_alt: Label });
export const ChargeConjKw     = createToken({ name: "ChargeConjKw",     pattern: /ChargeConj/,     longer_alt: Label });
export const CDecayKw         = createToken({ name: "CDecayKw",         pattern: /CDecay/,         longer_alt: Label });
export const DecayKw          = createToken({ name: "DecayKw",          pattern: /Decay/,          longer_alt: Label });
export const EnddecayKw       = createToken({ name: "EnddecayKw",       pattern: /Enddecay/,       longer_alt: Label });
export const EndKw            = createToken({ name: "EndKw",            pattern: /End/,            longer_alt: Label });
export const DefineKw         = createToken({ name: "DefineKw",         pattern: /Define/,         longer_alt: Label });
export const PythiaParamKw    = createToken({ name: "PythiaParamKw",    pattern: /Pythia(?:Both|Generic|Alias)Param/, longer_alt: Label });
export const SetLineshapePWKw = createToken({ name: "SetLineshapePWKw", pattern: /SetLineshapePW/, longer_alt: Label });
export const YesPhotosKw      = createToken({ name: "YesPhotosKw",      pattern: /yesPhotos/,      longer_alt: Label });
export const NoPhotosKw       = createToken({ name: "NoPhotosKw",       pattern: /noPhotos/,       longer_alt: Label });

/** Per-channel radiative-correction flag; only meaningful inside a channel */
export const PhotosFlag = createToken({ name: "PhotosFlag", pattern: /PHOTOS/, longer_alt: Label });

// ── Punctuation & literals ─────────────────────────────────────────────────

export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/,
  longer_alt: Label,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  Newline,
  WS,
  Comment,
  Semicolon,
  // Keywords before Label (longer_alt prevents prefix stealing)
  AliasKw,
  ChargeConjKw,
  CDecayKw,
  DecayKw,
  EnddecayKw,
  EndKw,
  DefineKw,
  PythiaParamKw,
  SetLineshapePWKw,
  YesPhotosKw,
  NoPhotosKw,
  PhotosFlag,
  NumberLiteral,
  Label,
];

/** Tokens that start a declaration statement */
export const declarationKeywords: readonly TokenType[] = [
  AliasKw,
  ChargeConjKw,
  CDecayKw,
  DecayKw,
  EnddecayKw,
  EndKw,
  DefineKw,
  PythiaParamKw,
  SetLineshapePWKw,
  YesPhotosKw,
  NoPhotosKw,
];

export const DecLexer = new Lexer(allTokens, {
  positionTracking: "full",
});

// ═══════════════════════════════════════════════════════════════════════════
//  Statement grouping
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One logical statement.
 *
 * A "declaration" starts with a keyword and ends at end of line; a
 * "channel" appears inside a Decay block and ends at `;` (the terminator is
 * not part of `tokens`).
 */
export type Statement = {
  kind: "declaration" | "channel";
  tokens: IToken[];
  /** 1-based line of the first token */
  line: number;
};

export type StatementStream = {
  statements: Statement[];
  /** True when an `End` statement stopped tokenizing before end of input */
  ended: boolean;
};

export function isDeclarationKeyword(token: IToken): boolean {
  return declarationKeywords.some((type) => tokenMatcher(token, type));
}

function position(token: IToken) {
  return { line: token.startLine ?? 1, column: token.startColumn ?? 1 };
}

/**
 * Tokenize decay-file text and split it into statements.
 *
 * Throws `LexError` on an unrecognized character, on a channel that is not
 * terminated by `;` before the next declaration or end of input, and on a
 * `;` outside a channel. Anything after a top-level `End` is ignored.
 */
export function tokenizeStatements(text: string): StatementStream {
  const lexResult = DecLexer.tokenize(text);
  const lexErrors = lexResult.errors;
  const statements: Statement[] = [];

  let buffer: IToken[] = [];
  let bufferKind: Statement["kind"] = "declaration";
  let inDecay = false;
  let ended = false;
  let nextError = 0;

  const flush = () => {
    if (buffer.length === 0) return;
    statements.push({ kind: bufferKind, tokens: buffer, line: buffer[0].startLine ?? 1 });
    buffer = [];
  };

  const lexErrorAt = (index: number) => {
    const e = lexErrors[index];
    return new LexError(`Unexpected character "${text.slice(e.offset, e.offset + e.length)}"`, {
      line: e.line,
      column: e.column,
    });
  };

  const unterminated = (at: IToken | undefined) => {
    const first = buffer[0];
    const where = at ? `before "${at.image}"` : "before end of input";
    return new LexError(
      `Decay channel starting with "${first.image}" is not terminated by ";" ${where}`,
      position(at ?? first),
    );
  };

  for (const token of lexResult.tokens) {
    // Report characters the lexer skipped, in source order
    if (nextError < lexErrors.length && lexErrors[nextError].offset < token.startOffset) {
      throw lexErrorAt(nextError);
    }

    const channelOpen = buffer.length > 0 && bufferKind === "channel";

    if (tokenMatcher(token, Newline)) {
      if (!channelOpen) flush();
      continue;
    }

    if (tokenMatcher(token, Semicolon)) {
      if (!channelOpen) {
        throw new LexError(`Unexpected ";" outside a decay channel`, position(token));
      }
      flush();
      continue;
    }

    if (buffer.length === 0) {
      const keyword = isDeclarationKeyword(token);
      if (inDecay && !keyword) {
        bufferKind = "channel";
      } else {
        bufferKind = "declaration";
        if (tokenMatcher(token, DecayKw)) inDecay = true;
        else if (tokenMatcher(token, EnddecayKw)) inDecay = false;
        else if (tokenMatcher(token, EndKw) && !inDecay) {
          buffer.push(token);
          flush();
          ended = true;
          break;
        }
      }
    } else if (channelOpen && isDeclarationKeyword(token)) {
      throw unterminated(token);
    }

    buffer.push(token);
  }

  if (!ended && nextError < lexErrors.length) {
    throw lexErrorAt(nextError);
  }
  if (buffer.length > 0 && bufferKind === "channel") {
    throw unterminated(undefined);
  }
  flush();

  return { statements, ended };
}
