export { parseDecFile, parseDecDiagnostics, DecFile } from "./dec-file.js";
export type { DecOptions, DecDiagnostic, DecParseResult, PythiaSetting, LineshapeSetting } from "./dec-file.js";
export { parseDeclarations, parseStatements, tokenizeStatements, DecLexer } from "./parser/index.js";
export type { Statement, StatementStream, StatementParserOptions } from "./parser/index.js";
export { SymbolTable } from "./symbols.js";
export { DecayRegistry } from "./registry.js";
export { conjugateBlock, generateConjugateDecays } from "./conjugate.js";
export type { ConjugateGeneration } from "./conjugate.js";
export { validate, DEFAULT_EPSILON } from "./validator.js";
export type { ValidateOptions } from "./validator.js";
export { resolveChain, enumerateFinalStates, buildDecayChain, DEFAULT_MAX_DEPTH } from "./chain.js";
export type { ChainOptions } from "./chain.js";
export { serializeDecFile, serializeDecayBlock, formatDecayModes } from "./dec-format.js";
export { createParticleLookup, loadParticleTable, defaultStableParticles } from "./particles.js";
export type { ParticleLookup, ParticleTable } from "./particles.js";
export { knownModels } from "./models.js";
export type { Logger } from "./telemetry.js";
export * from "./errors.js";
export type * from "./types.js";
