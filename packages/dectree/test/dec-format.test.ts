import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { parseDecFile, type DecFile } from "../src/dec-file.js";
import { formatDecayModes, serializeDecayBlock, serializeDecFile } from "../src/dec-format.js";
import { fixture } from "./_fixtures.js";

/** Registry contents without source lines, which change on re-serialization */
function shape(decFile: DecFile) {
  return decFile.registry.values().map((block) => ({
    particle: block.particle,
    origin: block.origin,
    conjugateOf: block.conjugateOf,
    channels: block.channels.map(({ line: _line, ...ch }) => ch),
  }));
}

// ═══════════════════════════════════════════════════════════════════════════
// serializeDecFile
// ═══════════════════════════════════════════════════════════════════════════

describe("serializeDecFile", () => {
  test("minimal file", () => {
    const decFile = parseDecFile("Alias MyK K+\nDecay MyK\n1.0 mu+ nu_mu PHSP;\nEnddecay\n");
    assert.equal(serializeDecFile(decFile), "Alias MyK K+\n\nDecay MyK\n1 mu+ nu_mu PHSP;\nEnddecay\n\nEnd\n");
  });

  for (const name of ["signal.dec", "settings.dec", "dstar.dec"]) {
    test(`${name} parses back to the same registry`, () => {
      const original = parseDecFile(fixture(name));
      const reparsed = parseDecFile(serializeDecFile(original));
      assert.deepEqual(shape(reparsed), shape(original));
      assert.deepEqual(reparsed.aliases, original.aliases);
      assert.deepEqual(reparsed.chargeConjugates, original.chargeConjugates);
      assert.deepEqual(reparsed.definitions, original.definitions);
      assert.deepEqual(reparsed.pythiaSettings, original.pythiaSettings);
      assert.deepEqual(reparsed.lineshapeDefinitions, original.lineshapeDefinitions);
      assert.equal(reparsed.declaredPhotos, original.declaredPhotos);
    });
  }

  test("generated blocks are written back as CDecay", () => {
    const text = serializeDecFile(parseDecFile(fixture("signal.dec")));
    assert.ok(text.includes("CDecay anti-B0sig\nCDecay MyD*+\nCDecay MyD+\nCDecay Myanti-D0\n"));
    assert.equal(text.includes("\nDecay anti-B0sig\n"), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Block rendering
// ═══════════════════════════════════════════════════════════════════════════

describe("serializeDecayBlock", () => {
  test("plain channel", () => {
    const decFile = parseDecFile(fixture("dstar.dec"));
    assert.equal(serializeDecayBlock(decFile.getDecayBlock("D0")), "Decay D0\n1 K- pi+ PHSP;\nEnddecay");
  });

  test("PHOTOS and substituted parameters", () => {
    const decFile = parseDecFile(fixture("settings.dec"));
    assert.equal(
      serializeDecayBlock(decFile.getDecayBlock("MyB0")),
      "Decay MyB0\n1 J/psi MyK*0 PHOTOS SVV_HELAMP 0.159 1.563 0.775 0 0.612 2.712;\nEnddecay",
    );
  });
});

describe("formatDecayModes", () => {
  test("fixed-width columns", () => {
    const decFile = parseDecFile(fixture("dstar.dec"));
    assert.equal(
      formatDecayModes(decFile.getDecayBlock("D0")),
      `${" ".repeat(11)}1 : ${" ".repeat(43)}K-  pi+ ${" ".repeat(11)}PHSP`,
    );
  });

  test("long model column is not truncated", () => {
    const decFile = parseDecFile(fixture("settings.dec"));
    assert.equal(
      formatDecayModes(decFile.getDecayBlock("MyB0")),
      `${" ".repeat(11)}1 : ${" ".repeat(38)}J/psi  MyK*0 PHOTOS SVV_HELAMP 0.159 1.563 0.775 0 0.612 2.712`,
    );
  });
});
