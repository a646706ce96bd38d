/**
 * Variable environment for one chain.
 *
 * Append-only: seeded with the projections of the primary inputs,
 * then one binding per evaluated step. Owned by a single verification
 * pass and never shared between chains.
 */

import { BitFunction } from "@chainverify/truth-table";
import type { Identifier } from "@chainverify/types";
import { identifierName, inputId } from "./identifiers.js";

export class VariableEnvironment {
  private readonly tables = new Map<number, BitFunction>();
  readonly numVars: number;

  private constructor(numVars: number) {
    this.numVars = numVars;
  }

  /**
   * Environment holding the `numVars` input projections.
   */
  static seeded(numVars: number): VariableEnvironment {
    const env = new VariableEnvironment(numVars);
    for (let k = 0; k < numVars; k++) {
      env.bind(inputId(k), BitFunction.projection(numVars, k));
    }
    return env;
  }

  /**
   * @throws {Error} if the identifier is already bound
   * @throws {RangeError} if the function has the wrong arity
   */
  bind(id: Identifier, fn: BitFunction): void {
    if (this.tables.has(id.index)) {
      throw new Error(`Identifier ${identifierName(id)} is already bound`);
    }
    if (fn.numVars !== this.numVars) {
      throw new RangeError(
        `Cannot bind ${identifierName(id)}: expected ${String(this.numVars)} variables, got ${String(fn.numVars)}`,
      );
    }
    this.tables.set(id.index, fn);
  }

  has(id: Identifier): boolean {
    return this.tables.has(id.index);
  }

  /**
   * @throws {Error} if the identifier is unbound
   */
  lookup(id: Identifier): BitFunction {
    const fn = this.tables.get(id.index);
    if (fn === undefined) {
      throw new Error(`Identifier ${identifierName(id)} is not bound`);
    }
    return fn;
  }

  get size(): number {
    return this.tables.size;
  }
}
