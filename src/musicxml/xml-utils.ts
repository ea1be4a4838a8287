import type { XmlNode } from "./xml-ast.js";

/** First child named `name`, if present. */
export function firstChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  if (!node) {
    return undefined;
  }
  return node.children.find((child) => child.name === name);
}

/** All children named `name`, in document order. */
export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) {
    return [];
  }
  return node.children.filter((child) => child.name === name);
}

/** True when `node` has at least one child named `name`. */
export function hasChild(node: XmlNode | undefined, name: string): boolean {
  return firstChild(node, name) !== undefined;
}

/**
 * First descendant (depth-first, document order) that satisfies `predicate`.
 * The node itself is not tested.
 */
export function findDescendant(
  node: XmlNode,
  predicate: (candidate: XmlNode) => boolean
): XmlNode | undefined {
  for (const child of node.children) {
    if (predicate(child)) return child;
    const nested = findDescendant(child, predicate);
    if (nested) return nested;
  }
  return undefined;
}

/** Trimmed text, or `undefined` when empty or missing. */
export function textOf(node: XmlNode | undefined): string | undefined {
  if (!node) {
    return undefined;
  }
  const text = node.text.trim();
  return text.length > 0 ? text : undefined;
}

export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/**
 * Parse a whole base-10 integer. Trailing junk ("4x") and fractions ("4.5")
 * yield `undefined`.
 */
export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

/** Parse a finite decimal number, `undefined` on failure. */
export function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
