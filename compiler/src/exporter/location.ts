/**
 * Instruction paths used in error messages:
 * `circuit.data[3] > composite.data[1] (measure)`.
 */

import type { Operation } from "../circuit/types.ts";

/** Segments leading to an instruction, outermost first. */
export type InstructionSite = readonly string[];

export function siteOf(parents: InstructionSite, owner: string, index: number): InstructionSite {
  return [...parents, `${owner}.data[${index}]`];
}

export function describeSite(site: InstructionSite, operation: Operation): string {
  return `${site.join(" > ")} (${operation.name})`;
}
