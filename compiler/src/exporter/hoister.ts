/**
 * Declaration hoisting.
 *
 * Walks the circuit depth-first and registers every operation that needs its
 * own `gate`, `def` or `opaque` block. Bodies are visited before the operation
 * that owns them, so the resulting list is already in dependency order:
 * every callee precedes its callers.
 */

import type {
  Circuit,
  DefinableOperation,
  Definition,
  GateOperation,
  Instruction,
  SubroutineOperation,
} from "../circuit/types.ts";
import { MalformedInputError, UnsupportedConstructError } from "../errors/index.ts";
import type { GlobalNamespace } from "../namespace/global-namespace.ts";
import { describeSite, type InstructionSite, siteOf } from "./location.ts";

// ─── Hoisted entries ─────────────────────────────────────────────────────────

interface HoistedBase {
  /** Output name assigned by the namespace. */
  name: string;
  /** Path of the first placement, used as the parent path of body errors. */
  site: InstructionSite;
}

export interface HoistedGate extends HoistedBase {
  kind: "gate";
  operation: GateOperation;
  definition: Definition;
}

export interface HoistedSubroutine extends HoistedBase {
  kind: "subroutine";
  operation: SubroutineOperation;
  definition: Definition;
}

/** A body-less operation outside the standard vocabulary, declared `opaque`. */
export interface HoistedCalibration extends HoistedBase {
  kind: "calibration";
  operation: DefinableOperation;
  /** Qubit count of the first placement. */
  arity: number;
}

export type HoistedDefinition = HoistedGate | HoistedSubroutine | HoistedCalibration;

// ─── Walk ────────────────────────────────────────────────────────────────────

export function hoistDefinitions(circuit: Circuit, namespace: GlobalNamespace): HoistedDefinition[] {
  const hoister = new Hoister(namespace);
  hoister.visitBody(circuit.data, circuit.name, []);
  return hoister.hoisted;
}

class Hoister {
  readonly hoisted: HoistedDefinition[] = [];
  /** Operations whose bodies are currently being walked. */
  private readonly active = new Set<DefinableOperation>();
  /** Qubit count each opaque operation was declared with. */
  private readonly opaqueArity = new Map<DefinableOperation, number>();
  private readonly namespace: GlobalNamespace;

  constructor(namespace: GlobalNamespace) {
    this.namespace = namespace;
  }

  visitBody(body: readonly Instruction[], owner: string, parents: InstructionSite): void {
    body.forEach((instruction, index) => {
      this.visitInstruction(instruction, siteOf(parents, owner, index));
    });
  }

  private visitInstruction(instruction: Instruction, site: InstructionSite): void {
    const op = instruction.operation;
    switch (op.kind) {
      case "barrier":
      case "measure":
        return;
      case "gate":
      case "subroutine":
        this.visitOperation(op, instruction, site);
        return;
      default: {
        const unknown: never = op;
        throw new UnsupportedConstructError(
          `unsupported operation ${JSON.stringify(unknown)}`,
          site.join(" > ")
        );
      }
    }
  }

  private visitOperation(op: DefinableOperation, instruction: Instruction, site: InstructionSite): void {
    const location = describeSite(site, op);
    this.checkArity(op, instruction, location);
    if (this.namespace.exists(op)) return;

    if (op.definition === null) {
      const name = this.namespace.register(op, location);
      const arity = instruction.qubits.length;
      this.opaqueArity.set(op, arity);
      this.hoisted.push({ kind: "calibration", name, site, operation: op, arity });
      return;
    }

    if (op.params.length < op.definition.parameters.length) {
      throw new MalformedInputError(
        `${op.kind} '${op.name}' is placed with ${op.params.length} parameter(s) ` +
          `but its definition takes ${op.definition.parameters.length}`,
        location
      );
    }
    if (this.active.has(op)) {
      throw new MalformedInputError(`${op.kind} '${op.name}' contains itself`, location);
    }
    this.active.add(op);
    this.visitBody(op.definition.body, op.definition.name, site);
    this.active.delete(op);

    const name = this.namespace.register(op, location);
    if (op.kind === "gate") {
      this.hoisted.push({ kind: "gate", name, site, operation: op, definition: op.definition });
    } else {
      this.hoisted.push({ kind: "subroutine", name, site, operation: op, definition: op.definition });
    }
  }

  /**
   * A placement must cover exactly the formal qubits of its definition, or,
   * for an opaque operation, as many qubits as its first placement.
   */
  private checkArity(op: DefinableOperation, instruction: Instruction, location: string): void {
    const expected =
      op.definition === null
        ? this.opaqueArity.get(op)
        : op.definition.qregs.reduce((total, register) => total + register.bits.length, 0);
    if (expected === undefined || expected === instruction.qubits.length) return;
    throw new MalformedInputError(
      `${op.kind} '${op.name}' acts on ${expected} qubit(s) but is placed on ${instruction.qubits.length}`,
      location
    );
  }
}
