/**
 * Text rendering of parsed decay files.
 */
import type { DecFile } from "./dec-file.js";
import type { DecayBlock, DecayChannel } from "./types.js";

/**
 * Render a DecFile back to decay-file text.
 *
 * Only `Decay` blocks written in the source are emitted; generated blocks
 * come back as `CDecay` statements. Model parameters are written as numbers
 * (constants were substituted at parse time), while the `Define`s themselves
 * are kept. Parsing the output gives an equal registry.
 */
export function serializeDecFile(decFile: DecFile): string {
  const sections: string[] = [];

  const photos = decFile.declaredPhotos;
  if (photos !== undefined) sections.push(photos ? "yesPhotos" : "noPhotos");

  const definitions = Object.entries(decFile.definitions);
  if (definitions.length > 0) {
    sections.push(definitions.map(([name, value]) => `Define ${name} ${value}`).join("\n"));
  }

  const pythia = decFile.pythiaSettings;
  if (pythia.length > 0) {
    sections.push(pythia.map((s) => `Pythia${s.generator}Param ${s.key}=${s.value}`).join("\n"));
  }

  const aliases = Object.entries(decFile.aliases);
  if (aliases.length > 0) {
    sections.push(aliases.map(([alias, target]) => `Alias ${alias} ${target}`).join("\n"));
  }

  const conjugates = Object.entries(decFile.chargeConjugates);
  if (conjugates.length > 0) {
    sections.push(conjugates.map(([p, cc]) => `ChargeConj ${p} ${cc}`).join("\n"));
  }

  const lineshapes = decFile.lineshapeDefinitions;
  if (lineshapes.length > 0) {
    sections.push(
      lineshapes.map((s) => `SetLineshapePW ${s.mother} ${s.daughters[0]} ${s.daughters[1]} ${s.value}`).join("\n"),
    );
  }

  for (const block of decFile.registry.values()) {
    if (block.origin === "decay") sections.push(serializeDecayBlock(block));
  }

  const cdecays = decFile.conjugateDecayRequests;
  if (cdecays.length > 0) {
    sections.push(cdecays.map((p) => `CDecay ${p}`).join("\n"));
  }

  sections.push("End");
  return sections.join("\n\n") + "\n";
}

export function serializeDecayBlock(block: DecayBlock): string {
  const lines = [`Decay ${block.particle}`];
  for (const ch of block.channels) {
    lines.push(`${ch.fraction} ${serializeChannelBody(ch)};`);
  }
  lines.push("Enddecay");
  return lines.join("\n");
}

function serializeChannelBody(ch: DecayChannel): string {
  const parts = [...ch.daughters];
  if (ch.photos) parts.push("PHOTOS");
  parts.push(ch.model, ...ch.modelParams.map(String));
  return parts.join(" ");
}

/**
 * Fixed-width table of a block's channels, one per line:
 * fraction, daughters, model, parameters.
 */
export function formatDecayModes(block: DecayBlock): string {
  return block.channels
    .map((ch) => {
      const fraction = String(ch.fraction).padStart(12);
      const daughters = ch.daughters.join("  ").padStart(50);
      const model = (ch.photos ? `PHOTOS ${ch.model}` : ch.model).padStart(15);
      return `${fraction} : ${daughters} ${model} ${ch.modelParams.join(" ")}`.trimEnd();
    })
    .join("\n");
}
