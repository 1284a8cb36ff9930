/**
 * Structural view of the tree-sitter node API used by the extractors.
 *
 * Kept narrow on purpose so that extractors depend on what they read, not on
 * the whole binding surface.
 */

export interface Point {
  row: number;
  column: number;
}

export interface Tree {
  rootNode: SyntaxNode;
}

export interface SyntaxNode {
  type: string;
  text: string;
  startPosition: Point;
  endPosition: Point;
  startIndex: number;
  endIndex: number;
  childCount: number;
  child(index: number): SyntaxNode | null;
  childForFieldName(name: string): SyntaxNode | null;
  children: SyntaxNode[];
  namedChildren: SyntaxNode[];
  parent: SyntaxNode | null;
}
