// src/util/toposort.ts
import { CyclicDependencyError } from "../errors.js";

export type DependencyEdge = { from: string; to: string }; // from depends on to (from has FK to to)

/**
 * Topological sort for table ordering based on FK dependencies.
 * Returns tables in an order where parent tables come before children.
 *
 * Among tables that are ready at the same time, `compare` decides which goes
 * first, so the result is deterministic for a given input.
 *
 * @throws CyclicDependencyError naming every table that sits on a cycle
 */
export function toposort(
  tables: string[],
  edges: DependencyEdge[],
  compare: (a: string, b: string) => number = compareNames,
): string[] {
  const inDegree = new Map<string, number>();
  const adjacency = new Map<string, Set<string>>();

  for (const table of tables) {
    inDegree.set(table, 0);
    adjacency.set(table, new Set());
  }

  // In adjacency we track: to -> {from, ...} (to must come before from)
  for (const { from, to } of edges) {
    const dependents = adjacency.get(to);
    if (!dependents || !inDegree.has(from)) continue;
    if (from === to) continue; // self-reference, resolved row by row
    if (dependents.has(from)) continue; // several FKs between the same pair

    dependents.add(from);
    inDegree.set(from, (inDegree.get(from) ?? 0) + 1);
  }

  // Kahn's algorithm over a ready list kept in `compare` order
  const ready = tables.filter((t) => inDegree.get(t) === 0).sort(compare);

  const result: string[] = [];
  for (let current = ready.shift(); current !== undefined; current = ready.shift()) {
    result.push(current);

    for (const neighbor of adjacency.get(current) ?? []) {
      const newDegree = (inDegree.get(neighbor) ?? 1) - 1;
      inDegree.set(neighbor, newDegree);
      if (newDegree === 0) {
        insertSorted(ready, neighbor, compare);
      }
    }
  }

  if (result.length !== tables.length) {
    const placed = new Set(result);
    const remaining = tables.filter((t) => !placed.has(t));
    throw new CyclicDependencyError(findCycles(remaining, adjacency));
  }

  return result;
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function insertSorted(
  list: string[],
  item: string,
  compare: (a: string, b: string) => number,
): void {
  let idx = list.findIndex((other) => compare(item, other) < 0);
  if (idx === -1) idx = list.length;
  list.splice(idx, 0, item);
}

/**
 * Strongly connected components (Tarjan) of size >= 2 among the tables that
 * Kahn's algorithm could not place. Tables that only depend on a cycle are
 * left out.
 */
function findCycles(
  remaining: string[],
  adjacency: Map<string, Set<string>>,
): string[][] {
  const nodes = new Set(remaining);
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  const visit = (node: string): void => {
    index.set(node, counter);
    lowLink.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const next of adjacency.get(node) ?? []) {
      if (!nodes.has(next)) continue;
      if (!index.has(next)) {
        visit(next);
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(next) ?? 0));
      } else if (onStack.has(next)) {
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (lowLink.get(node) === index.get(node)) {
      const component: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.push(member);
      } while (member !== node);

      if (component.length > 1) {
        components.push(component.sort(compareNames));
      }
    }
  };

  for (const node of remaining) {
    if (!index.has(node)) visit(node);
  }

  return components.sort((a, b) => compareNames(a[0] ?? "", b[0] ?? ""));
}

/**
 * Build FK edges from a schema for use with toposort.
 */
export function buildFkEdges(
  tables: ReadonlyArray<{
    name: string;
    foreignKeys: ReadonlyArray<{ refTable: string }>;
  }>,
): DependencyEdge[] {
  const edges: DependencyEdge[] = [];

  for (const table of tables) {
    for (const fk of table.foreignKeys) {
      edges.push({ from: table.name, to: fk.refTable });
    }
  }

  return edges;
}
