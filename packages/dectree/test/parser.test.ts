/**
 * Parser tests: statements to typed declarations.
 */
import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { parseDeclarations } from "../src/parser/parser.js";
import type { DecayDecl, Declaration } from "../src/types.js";

function decayOf(declarations: Declaration[]): DecayDecl {
  const decay = declarations.find((d): d is DecayDecl => d.kind === "decay");
  assert.ok(decay, "expected a decay declaration");
  return decay;
}

function channelsOf(text: string, models?: string[]) {
  return decayOf(parseDeclarations(text, { models })).channels;
}

// ═══════════════════════════════════════════════════════════════════════════
// Declarations
// ═══════════════════════════════════════════════════════════════════════════

describe("parser: declarations", () => {
  test("every top-level declaration kind", () => {
    const text = [
      "Alias MyK K+",
      "ChargeConj MyK Myanti-K",
      "Define a 0.5",
      "PythiaAliasParam 23:onMode=off",
      "SetLineshapePW D_1+ D*+ pi0 2",
      "noPhotos",
      "CDecay X",
      "End",
    ].join("\n");

    assert.deepEqual(parseDeclarations(text), [
      { kind: "alias", name: "MyK", target: "K+", line: 1 },
      { kind: "chargeConj", particle: "MyK", conjugate: "Myanti-K", line: 2 },
      { kind: "define", name: "a", value: 0.5, line: 3 },
      { kind: "pythiaParam", generator: "Alias", key: "23:onMode", value: "off", line: 4 },
      { kind: "lineshapePW", mother: "D_1+", daughters: ["D*+", "pi0"], value: 2, line: 5 },
      { kind: "photos", enabled: false, line: 6 },
      { kind: "cdecay", particle: "X", line: 7 },
      { kind: "end", line: 8 },
    ]);
  });

  test("numeric Pythia values become numbers", () => {
    assert.deepEqual(parseDeclarations("PythiaBothParam Next:numberShowEvent=0\n"), [
      { kind: "pythiaParam", generator: "Both", key: "Next:numberShowEvent", value: 0, line: 1 },
    ]);
  });

  test("statements after End are not parsed", () => {
    assert.deepEqual(parseDeclarations("Alias A B\nEnd\nDecay X\n"), [
      { kind: "alias", name: "A", target: "B", line: 1 },
      { kind: "end", line: 2 },
    ]);
  });

  test("wrong number of arguments", () => {
    assert.throws(() => parseDeclarations("Alias X\n"), {
      name: "DecSyntaxError",
      message: "Line 1: Alias expects <alias> <particle>, got 1 argument(s)",
    });
  });

  test("non-numeric Define value", () => {
    assert.throws(() => parseDeclarations("Define x abc\n"), { name: "DecSyntaxError", line: 1 });
  });

  test("bare names outside a Decay block", () => {
    assert.throws(() => parseDeclarations("K+ pi-\n"), {
      name: "DecSyntaxError",
      message: 'Line 1: Unexpected "K+" outside a Decay block',
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Decay blocks and channels
// ═══════════════════════════════════════════════════════════════════════════

describe("parser: channels", () => {
  test("PHOTOS flag, model parameters and Define substitution", () => {
    const declarations = parseDeclarations(
      "Define c 0.25\nDecay B0\n0.5 K+ pi- PHOTOS PHSP;\n0.5 D0 anti-D0 SSD_CP 1.0 c -0.5;\nEnddecay\n",
    );
    assert.equal(declarations.length, 2);
    assert.deepEqual(decayOf(declarations), {
      kind: "decay",
      particle: "B0",
      line: 2,
      channels: [
        { fraction: 0.5, daughters: ["K+", "pi-"], model: "PHSP", modelParams: [], photos: true, line: 3 },
        { fraction: 0.5, daughters: ["D0", "anti-D0"], model: "SSD_CP", modelParams: [1, 0.25, -0.5], photos: false, line: 4 },
      ],
    });
  });

  test("constants may be defined after their use", () => {
    const [ch] = channelsOf("Decay B0\n1.0 K+ pi- SVS c;\nEnddecay\nDefine c 2\n");
    assert.deepEqual(ch.modelParams, [2]);
  });

  test("a model name missing from the table is taken from before the parameters", () => {
    const [ch] = channelsOf("Decay B0\n1.0 K+ pi- MY_CUSTOM 0.5 1;\nEnddecay\n");
    assert.equal(ch.model, "MY_CUSTOM");
    assert.deepEqual(ch.daughters, ["K+", "pi-"]);
    assert.deepEqual(ch.modelParams, [0.5, 1]);
  });

  test("caller-supplied model names", () => {
    const [ch] = channelsOf("Decay B0\n1.0 K+ pi- MyModel;\nEnddecay\n", ["MyModel"]);
    assert.equal(ch.model, "MyModel");
    assert.throws(() => channelsOf("Decay B0\n1.0 K+ pi- MyModel;\nEnddecay\n"), { name: "MissingModelError" });
  });

  test("an alias spelled like a model is a daughter", () => {
    const [ch] = channelsOf("Alias VSS K+\nDecay B0\n1.0 pi- VSS PHSP;\nEnddecay\n");
    assert.deepEqual(ch.daughters, ["pi-", "VSS"]);
    assert.equal(ch.model, "PHSP");
  });

  test("a known particle is never taken as the model", () => {
    assert.throws(() => channelsOf("Decay B0\n1.0 K+ D0;\nEnddecay\n"), {
      name: "MissingModelError",
      message: 'Line 2: No decay model found in channel "1.0 K+ D0"',
    });
  });

  test("negative or non-numeric fraction", () => {
    assert.throws(() => channelsOf("Decay B0\n-0.5 K+ pi- PHSP;\nEnddecay\n"), {
      name: "InvalidFractionError",
      message: 'Line 2: "-0.5" is not a valid branching fraction',
    });
    assert.throws(() => channelsOf("Decay B0\nabc K+ pi- PHSP;\nEnddecay\n"), { name: "InvalidFractionError" });
  });

  test("parameter that is neither a number nor a constant", () => {
    assert.throws(() => channelsOf("Decay B0\n1.0 K+ pi- PHSP foo;\nEnddecay\n"), {
      name: "InvalidModelParamError",
      message: 'Line 2: "foo" is not a number or a defined constant (model PHSP)',
    });
  });

  test("PHOTOS away from the model", () => {
    assert.throws(() => channelsOf("Decay B0\n1.0 K+ PHOTOS pi- PHSP;\nEnddecay\n"), {
      name: "DecSyntaxError",
      message: "Line 2: PHOTOS must directly precede the model name",
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Block structure
// ═══════════════════════════════════════════════════════════════════════════

describe("parser: block structure", () => {
  test("Decay inside an open Decay", () => {
    assert.throws(() => parseDeclarations("Decay A\nDecay B\nEnddecay\n"), {
      name: "NestedDecayError",
      particle: "B",
      openParticle: "A",
      line: 2,
      message: 'Line 2: "Decay B" opened while "Decay A" is still open',
    });
  });

  test("Decay without Enddecay at end of input", () => {
    assert.throws(() => parseDeclarations("Decay A\n1.0 K+ K- PHSP;\n"), {
      name: "UnterminatedDecayError",
      particle: "A",
      line: 1,
    });
  });

  test("End inside a Decay block", () => {
    assert.throws(() => parseDeclarations("Decay A\nEnd\n"), { name: "UnterminatedDecayError" });
  });

  test("Enddecay without Decay", () => {
    assert.throws(() => parseDeclarations("Enddecay\n"), {
      name: "DecSyntaxError",
      message: "Line 1: Enddecay without a matching Decay",
    });
  });

  test("declaration inside a Decay block", () => {
    assert.throws(() => parseDeclarations("Decay A\nAlias X Y\nEnddecay\n"), {
      name: "DecSyntaxError",
      message: 'Line 2: "Alias" is not allowed inside "Decay A"',
    });
  });
});
