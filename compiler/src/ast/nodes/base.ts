/** Common fields shared by all AST nodes. */
export interface BaseNode {
  readonly kind: string;
}
