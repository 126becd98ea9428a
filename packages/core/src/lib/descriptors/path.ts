/**
 * Field path resolution.
 *
 * Paths are dot-delimited. A leading `#.` (calldata root) is dropped;
 * container-relative `@.` and descriptor-relative `$.` paths never resolve
 * against calldata. A segment is a member name, a numeric index, or a name
 * followed by `[n]` indexes, where negative indexes count from the end and
 * `[]` keeps the whole array.
 */

import type { ArgumentNode } from "./arguments";

export type PathSegment =
  | { kind: "name"; name: string }
  | { kind: "index"; index: number }
  | { kind: "all" };

const SEGMENT_PATTERN = /^([^[\]]*)((?:\[-?\d*\])*)$/;

export function parsePath(path: string): PathSegment[] | null {
  let rest = path.trim();
  if (rest.startsWith("#.")) rest = rest.slice(2);
  if (rest === "" || rest.startsWith("@") || rest.startsWith("$")) return null;

  const segments: PathSegment[] = [];
  for (const part of rest.split(".")) {
    const match = SEGMENT_PATTERN.exec(part);
    if (!match) return null;
    const [, head, brackets] = match;

    if (head !== "") {
      segments.push(/^-?\d+$/.test(head) ? { kind: "index", index: Number(head) } : { kind: "name", name: head });
    } else if (brackets === "") {
      return null;
    }

    for (const [, index] of brackets.matchAll(/\[(-?\d*)\]/g)) {
      segments.push(index === "" ? { kind: "all" } : { kind: "index", index: Number(index) });
    }
  }
  return segments;
}

function at<T>(items: readonly T[], index: number): T | null {
  const position = index < 0 ? items.length + index : index;
  return position >= 0 && position < items.length ? items[position] : null;
}

function step(node: ArgumentNode, segment: PathSegment): ArgumentNode | null {
  switch (segment.kind) {
    case "name":
      if (node.kind !== "tuple") return null;
      return node.members.find((member) => member.name === segment.name)?.node ?? null;
    case "index":
      if (node.kind === "array") return at(node.items, segment.index);
      if (node.kind === "tuple") return at(node.members, segment.index)?.node ?? null;
      return null;
    case "all":
      return node.kind === "array" ? node : null;
  }
}

/**
 * Resolve a path against a decoded argument tree; null when any step misses.
 */
export function resolvePath(root: ArgumentNode, path: string): ArgumentNode | null {
  const segments = parsePath(path);
  if (!segments) return null;

  let node: ArgumentNode | null = root;
  for (const segment of segments) {
    node = step(node, segment);
    if (!node) return null;
  }
  return node;
}
