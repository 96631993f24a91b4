import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { parseDecFile } from "../src/dec-file.js";
import { createLogCapture, fixture } from "./_fixtures.js";

// ═══════════════════════════════════════════════════════════════════════════
// Logging
//
// When a `logger` is passed to parseDecFile, build events (statement counts,
// generated decays, non-info findings, fatal errors) are routed through it.
// Without one, nothing is written anywhere.
// ═══════════════════════════════════════════════════════════════════════════

describe("logging: build summary", () => {
  test("info summary and debug statement counts", () => {
    const logger = createLogCapture();
    parseDecFile(fixture("signal.dec"), { logger });
    assert.deepEqual(logger.infoMessages, ["[dectree] 8 decays (4 from CDecay), 1 findings"]);
    assert.deepEqual(logger.debugMessages, ["[dectree] 31 statements, 21 declarations"]);
    assert.deepEqual(logger.warnMessages, [], "info findings are not logged");
    assert.deepEqual(logger.errorMessages, []);
  });

  test("skipped conjugate generation is logged at debug", () => {
    const logger = createLogCapture();
    parseDecFile(fixture("signal.dec"), { logger, includeConjugateDecays: false });
    assert.ok(
      logger.debugMessages.includes("[dectree] skipping 4 CDecay request(s)"),
      `got: ${JSON.stringify(logger.debugMessages)}`,
    );
  });

  test("the default logger is silent", () => {
    assert.doesNotThrow(() => parseDecFile(fixture("dstar.dec")));
  });
});

describe("logging: warnings", () => {
  test("redefined constant", () => {
    const logger = createLogCapture();
    const decFile = parseDecFile("Define a 1\nDefine a 2\n", { logger });
    assert.deepEqual(logger.warnMessages, ["[dectree] line 2: a redefined from 1 to 2"]);
    assert.deepEqual(decFile.definitions, { a: 2 });
  });

  test("PHOTOS flag set twice", () => {
    const logger = createLogCapture();
    const decFile = parseDecFile("yesPhotos\nnoPhotos\n", { logger });
    assert.deepEqual(logger.warnMessages, ["[dectree] line 2: PHOTOS flag re-set, using the last one"]);
    assert.equal(decFile.globalPhotos, false);
  });

  test("warning findings are logged at warn, escalated ones at error", () => {
    const text = "Decay D0\n0.7 K- pi+ PHSP;\n0.4 K+ K- PHSP;\nEnddecay\n";
    const message = `[dectree] Branching fractions of "D0" sum to ${0.7 + 0.4}, more than 1`;

    const lenient = createLogCapture();
    parseDecFile(text, { logger: lenient });
    assert.deepEqual(lenient.warnMessages, [message]);

    const strict = createLogCapture();
    parseDecFile(text, { logger: strict, overUnitySeverity: "error" });
    assert.deepEqual(strict.errorMessages, [message]);
  });
});

describe("logging: failures", () => {
  test("fatal errors are logged before they are thrown", () => {
    const logger = createLogCapture();
    assert.throws(() => parseDecFile("Decay A\n", { logger }), { name: "UnterminatedDecayError" });
    assert.deepEqual(logger.errorMessages, ['[dectree] parse failed: Line 1: "Decay A" has no matching Enddecay']);
  });
});
