export interface TreeNode {
  id: number;
  name: string;
  parentId: number | null;
}

// Guards against parent cycles that predate the descendant check.
const MAX_DEPTH = 32;

/** The node followed by its ancestors, nearest first. */
export function ancestorChain<T extends TreeNode>(id: number, byId: ReadonlyMap<number, T>): T[] {
  const chain: T[] = [];
  const seen = new Set<number>();
  let current = byId.get(id);

  while (current && !seen.has(current.id) && chain.length < MAX_DEPTH) {
    chain.push(current);
    seen.add(current.id);
    current = current.parentId === null ? undefined : byId.get(current.parentId);
  }
  return chain;
}

/** Names from the root down to the node itself. */
export function pathFromRoot(id: number, byId: ReadonlyMap<number, TreeNode>): string[] {
  return ancestorChain(id, byId)
    .map((node) => node.name)
    .reverse();
}

/**
 * True when making `parentId` the parent of `id` would close a cycle,
 * which includes pointing a node at itself.
 */
export function wouldCreateCycle(id: number, parentId: number, byId: ReadonlyMap<number, TreeNode>): boolean {
  if (id === parentId) return true;
  return ancestorChain(parentId, byId).some((node) => node.id === id);
}

export function indexById<T extends { id: number }>(nodes: readonly T[]): Map<number, T> {
  return new Map(nodes.map((node) => [node.id, node]));
}
