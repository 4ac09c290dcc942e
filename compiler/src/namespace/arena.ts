/**
 * Identity arena: hands out a dense index the first time an object is seen.
 *
 * Maps elsewhere are keyed by the index, never by the object, so every
 * derived name (e.g. `my_gate_1`) depends only on the order of first sight
 * and two exports of the same circuit agree byte for byte.
 */
export class IdentityArena<T extends object> {
  private readonly ids = new Map<T, number>();

  /** Index of `item`, assigning the next free one on first sight. */
  idOf(item: T): number {
    const existing = this.ids.get(item);
    if (existing !== undefined) return existing;
    const id = this.ids.size;
    this.ids.set(item, id);
    return id;
  }

  /** Index of `item` if it was seen before, without assigning one. */
  lookup(item: T): number | undefined {
    return this.ids.get(item);
  }

  get size(): number {
    return this.ids.size;
  }
}
