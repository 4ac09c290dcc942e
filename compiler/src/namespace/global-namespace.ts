/**
 * Per-export registry mapping operations and parameters to their output names.
 *
 * The forward map holds names seeded before the export starts (standard gates
 * from the include files, language keywords), register names reserved by the
 * builder, and names bound to a custom operation by `register` or to a free
 * parameter by `bindParameter`. Operations and parameters are keyed by their
 * arena index, so two distinct objects that share a display name end up with
 * two distinct output names, and the later one is suffixed with its index
 * (`my_gate_1`).
 */

import type { DefinableOperation, Parameter } from "../circuit/types.ts";
import { MalformedInputError } from "../errors/index.ts";
import { IdentityArena } from "./arena.ts";
import vocabulary from "./vocabulary.json";

// ─── Vocabulary ──────────────────────────────────────────────────────────────

const INCLUDE_GATES: Readonly<Record<string, readonly string[]>> = vocabulary.includes;

/** Name the universal single-qubit gate is emitted under. */
export const UNIVERSAL_GATE: string = vocabulary.universal;

export const RESERVED_WORDS: ReadonlySet<string> = new Set(vocabulary.reserved);

/** Standard gates brought into scope by `includes`, in include order. Unknown files contribute nothing. */
export function standardGates(includes: readonly string[]): string[] {
  return includes.flatMap((file) => INCLUDE_GATES[file] ?? []);
}

// ─── Namespace ───────────────────────────────────────────────────────────────

type Binding =
  | { kind: "standard" }
  | { kind: "reserved" }
  | { kind: "register" }
  | { kind: "operation"; id: number }
  | { kind: "parameter"; id: number };

export class GlobalNamespace {
  /** Output name → what it is bound to. */
  private readonly forward = new Map<string, Binding>();
  /** Arena index → output name. */
  private readonly backward = new Map<number, string>();
  private readonly arena = new IdentityArena<DefinableOperation>();
  private readonly parameterArena = new IdentityArena<Parameter>();
  /** Parameter arena index → output name. */
  private readonly parameterNames = new Map<number, string>();

  constructor(includes: readonly string[]) {
    for (const word of RESERVED_WORDS) {
      this.forward.set(word, { kind: "reserved" });
    }
    this.forward.set(UNIVERSAL_GATE, { kind: "reserved" });
    for (const name of standardGates(includes)) {
      this.forward.set(name, { kind: "standard" });
    }
  }

  /** Body-less `u`/`U`: always available, emitted as `U`. */
  isUniversalGate(op: DefinableOperation): boolean {
    return (
      op.kind === "gate" &&
      op.definition === null &&
      (op.name === "u" || op.name === UNIVERSAL_GATE)
    );
  }

  /** Body-less gate whose name an included file declares. */
  isStandardGate(op: DefinableOperation): boolean {
    return (
      op.kind === "gate" &&
      op.definition === null &&
      this.forward.get(op.name)?.kind === "standard"
    );
  }

  /** Whether `op` needs no new definition: it is built in, or already registered. */
  exists(op: DefinableOperation): boolean {
    if (this.isUniversalGate(op) || this.isStandardGate(op)) return true;
    const id = this.arena.lookup(op);
    return id !== undefined && this.backward.has(id);
  }

  /**
   * Bind `op` to an output name and return it. Registering the same operation
   * twice returns the first name.
   */
  register(op: DefinableOperation, location: string | null = null): string {
    if (op.name.length === 0) {
      throw new MalformedInputError(`${op.kind} has an empty name`, location);
    }
    const id = this.arena.idOf(op);
    const existing = this.backward.get(id);
    if (existing !== undefined) return existing;

    const name = this.freshName(op.name, id);
    this.forward.set(name, { kind: "operation", id });
    this.backward.set(id, name);
    return name;
  }

  /** Claim a register name so later operations and parameters avoid it. */
  reserveRegister(name: string): void {
    if (!this.forward.has(name)) this.forward.set(name, { kind: "register" });
  }

  /** Bind a free parameter to an output name, suffixed like operations on collision. */
  bindParameter(parameter: Parameter, location: string | null = null): string {
    if (parameter.name.length === 0) {
      throw new MalformedInputError("parameter has an empty name", location);
    }
    const id = this.parameterArena.idOf(parameter);
    const existing = this.parameterNames.get(id);
    if (existing !== undefined) return existing;

    const name = this.freshName(parameter.name, id);
    this.forward.set(name, { kind: "parameter", id });
    this.parameterNames.set(id, name);
    return name;
  }

  /** Output name of a bound parameter, if any. */
  parameterName(parameter: Parameter): string | undefined {
    const id = this.parameterArena.lookup(parameter);
    return id === undefined ? undefined : this.parameterNames.get(id);
  }

  /**
   * Whether a definition-local name would shadow something global. Bound
   * parameters do not count: a formal may share a name with an input.
   */
  shadows(name: string): boolean {
    const binding = this.forward.get(name);
    return binding !== undefined && binding.kind !== "parameter";
  }

  /** Output name of an operation that is built in or was registered. */
  nameOf(op: DefinableOperation, location: string | null = null): string {
    if (this.isUniversalGate(op)) return UNIVERSAL_GATE;
    if (this.isStandardGate(op)) return op.name;
    const id = this.arena.lookup(op);
    const name = id === undefined ? undefined : this.backward.get(id);
    if (name === undefined) {
      throw new MalformedInputError(`${op.kind} '${op.name}' was used but never defined`, location);
    }
    return name;
  }

  /** Number of custom operations registered so far. */
  get registeredCount(): number {
    return this.backward.size;
  }

  /** `base`, or `base_<id>`, then `base_<id>_1`, `base_<id>_2`, … until unused. */
  private freshName(base: string, id: number): string {
    if (!this.forward.has(base)) return base;
    const suffixed = `${base}_${id}`;
    let name = suffixed;
    for (let n = 1; this.forward.has(name); n++) {
      name = `${suffixed}_${n}`;
    }
    return name;
  }
}
