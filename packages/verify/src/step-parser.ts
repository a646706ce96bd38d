/**
 * Step parser.
 *
 * Grammar (ASCII, one trimmed line):
 *
 *   <Output> " = " <GateBits> (" " <Fanin>){fanin}
 *
 * Checks run in order and the first failure is returned:
 * 1. Output letter matches the step position
 * 2. Separator is exactly " = "
 * 3. Gate is `2^fanin` binary digits
 * 4. Gate is normalized (output 0 on the all-zero pattern)
 * 5. Each fanin is " " plus a bound identifier, in non-decreasing order
 * 6. Nothing follows the last fanin
 */

import { BitFunction, TruthTableFormatError } from "@chainverify/truth-table";
import type { Identifier, ViolationRule } from "@chainverify/types";
import type { VariableEnvironment } from "./environment.js";
import { identifierName, parseIdentifier, stepId } from "./identifiers.js";
import type { Step, StepResult } from "./types.js";
import { violation } from "./violations.js";

const SEPARATOR = " = ";

function fail(
  rule: ViolationRule,
  message: string,
  position: number,
  line: string,
): StepResult<Step> {
  return { ok: false, violation: violation(rule, message, position, line) };
}

/**
 * Parse the step at `position`.
 *
 * Fanins must already be bound in `env`; the parser does not bind the
 * step's own output.
 */
export function parseStep(
  line: string,
  position: number,
  fanin: number,
  env: VariableEnvironment,
): StepResult<Step> {
  const output = stepId(env.numVars, position);

  if (line.charAt(0) !== identifierName(output)) {
    return fail("INVALID_STEP_NAME", `invalid step ${line}`, position, line);
  }

  if (line.slice(1, 1 + SEPARATOR.length) !== SEPARATOR) {
    return fail("MALFORMED_SEPARATOR", `mal-formed step ${line}`, position, line);
  }

  let cursor = 1 + SEPARATOR.length;
  const gateLength = 2 ** fanin;
  const gateBits = line.slice(cursor, cursor + gateLength);
  cursor += gateLength;

  let gate: BitFunction;
  try {
    gate = BitFunction.fromBinary(fanin, gateBits);
  } catch (err: unknown) {
    if (err instanceof TruthTableFormatError) {
      return fail("MALFORMED_GATE", `mal-formed gate in ${line}: ${err.message}`, position, line);
    }
    throw err;
  }

  if (gate.getBit(0) !== 0) {
    return fail("GATE_NOT_NORMALIZED", `gate is not normalized in ${line}`, position, line);
  }

  const fanins: Identifier[] = [];
  let lastIndex = 0;
  for (let j = 0; j < fanin; j++) {
    if (line.charAt(cursor) !== " " || cursor + 1 >= line.length) {
      return fail("MALFORMED_FANIN", `mal-formed step ${line}`, position, line);
    }

    const ch = line.charAt(cursor + 1);
    const id = parseIdentifier(ch, env.numVars);
    if (id === undefined || !env.has(id)) {
      return fail("UNBOUND_FANIN", `unknown fanin ${ch} in ${line}`, position, line);
    }

    if (id.index < lastIndex) {
      return fail("FANIN_ORDER", `fanins are in wrong order in ${line}`, position, line);
    }

    lastIndex = id.index;
    fanins.push(id);
    cursor += 2;
  }

  if (cursor !== line.length) {
    return fail("TRAILING_CHARACTERS", `mal-formed step ${line}`, position, line);
  }

  return {
    ok: true,
    value: { position, output, gateBits, gate, fanins, line },
  };
}
