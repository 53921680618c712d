/**
 * Line-tree parser for indentation-hierarchical configuration text.
 *
 * A command line owns every following line with strictly greater indentation,
 * up to the next line at equal or lesser indentation. The text has no single
 * root, so the result is a forest. Malformed indentation never throws; an
 * ambiguous line simply ends up higher in the tree.
 */

import type { LineNode } from "./types";

const LEADING_WHITESPACE = /^\s*/;

/**
 * Parsed configuration text with pattern queries over its nodes.
 */
export class LineTree {
  readonly roots: LineNode[];

  constructor(roots: LineNode[]) {
    this.roots = roots;
  }

  /**
   * Top-level nodes whose text matches the pattern, in document order.
   */
  rootsMatching(pattern: RegExp): LineNode[] {
    return this.roots.filter((node) => pattern.test(node.text));
  }

  /**
   * Direct children of a node whose text matches the pattern, in order.
   */
  children(node: LineNode, pattern: RegExp): LineNode[] {
    return node.children.filter((child) => pattern.test(child.text));
  }

  /**
   * Nodes at any depth whose text matches the pattern, in document order.
   */
  findAll(pattern: RegExp): LineNode[] {
    const found: LineNode[] = [];
    const visit = (nodes: LineNode[]): void => {
      for (const node of nodes) {
        if (pattern.test(node.text)) found.push(node);
        visit(node.children);
      }
    };
    visit(this.roots);
    return found;
  }

  /** Number of nodes in the whole forest. */
  size(): number {
    return this.findAll(/^/).length;
  }
}

/**
 * Build the line tree for a configuration text.
 */
export function parseLineTree(text: string): LineTree {
  const roots: LineNode[] = [];
  const stack: LineNode[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    if (raw.trim().length === 0) return;

    const depth = LEADING_WHITESPACE.exec(raw)?.[0].length ?? 0;
    const node: LineNode = {
      text: raw.trim(),
      depth,
      lineNumber: index + 1,
      children: []
    };

    while (stack.length > 0 && stack[stack.length - 1].depth >= depth) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  });

  return new LineTree(roots);
}
