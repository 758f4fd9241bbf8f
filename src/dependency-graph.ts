import { extractDependencies } from "./denormalizer.js";
import type { PoolStorage } from "./pool-storage.js";

export type DependencyNodeCategory = "stored" | "missing";

export interface FunctionDependencyRecord {
  hash: string;
  dependencyHashes?: string[];
}

export interface MissingDependencyRef {
  hash: string;
  dependencyHash: string;
}

export interface DependencyGraphNode {
  hash: string;
  category: DependencyNodeCategory;
  dependencyHashes: string[];
  dependentHashes: string[];
}

export interface PoolDependencyGraph {
  nodeHashes: string[];
  nodes: Record<string, DependencyGraphNode>;
  edgeCount: number;
  storedNodeCount: number;
  missingNodeCount: number;
  missingDependencyRefs: MissingDependencyRef[];
  sccs: string[][];
  cyclicSccs: string[][];
}

export interface DependencyOrderOptions {
  includeMissing?: boolean;
}

export function buildDependencyGraph(records: FunctionDependencyRecord[]): PoolDependencyGraph {
  const normalized = normalizeRecords(records);
  const storedHashes = new Set(normalized.map((record) => record.hash));
  const nodes = new Map<string, DependencyGraphNode>();

  for (const record of normalized) {
    nodes.set(record.hash, createNode(record.hash, "stored"));
  }

  const missingDependencyRefs: MissingDependencyRef[] = [];
  let edgeCount = 0;

  for (const record of normalized) {
    const fromNode = requireNode(nodes, record.hash);
    for (const dependencyHash of record.dependencyHashes) {
      if (!storedHashes.has(dependencyHash)) {
        missingDependencyRefs.push({ hash: record.hash, dependencyHash });
        if (!nodes.has(dependencyHash)) {
          nodes.set(dependencyHash, createNode(dependencyHash, "missing"));
        }
      }
      fromNode.dependencyHashes.push(dependencyHash);
      requireNode(nodes, dependencyHash).dependentHashes.push(record.hash);
      edgeCount += 1;
    }
  }

  const nodeHashes = [...nodes.keys()].sort();
  const graphNodes: Record<string, DependencyGraphNode> = {};
  for (const hash of nodeHashes) {
    const node = requireNode(nodes, hash);
    node.dependencyHashes = uniqueSorted(node.dependencyHashes);
    node.dependentHashes = uniqueSorted(node.dependentHashes);
    graphNodes[hash] = node;
  }

  const sccs = computeStronglyConnectedComponents(graphNodes, nodeHashes);
  const cyclicSccs = sccs.filter((component) => {
    if (component.length > 1) {
      return true;
    }
    const single = component[0];
    return graphNodes[single].dependencyHashes.includes(single);
  });

  return {
    nodeHashes,
    nodes: graphNodes,
    edgeCount,
    storedNodeCount: nodeHashes.filter((hash) => graphNodes[hash].category === "stored").length,
    missingNodeCount: nodeHashes.filter((hash) => graphNodes[hash].category === "missing").length,
    missingDependencyRefs: missingDependencyRefs.sort((left, right) => {
      if (left.hash !== right.hash) {
        return left.hash < right.hash ? -1 : 1;
      }
      return compareText(left.dependencyHash, right.dependencyHash);
    }),
    sccs,
    cyclicSccs,
  };
}

// Walks the pool breadth-first from `rootHash`; unknown hashes become missing nodes.
export async function collectReachableRecords(storage: PoolStorage, rootHash: string): Promise<FunctionDependencyRecord[]> {
  const records: FunctionDependencyRecord[] = [];
  const queue = [rootHash];
  const seen = new Set(queue);

  while (queue.length > 0) {
    const hash = queue.shift();
    if (hash === undefined || !(await storage.hasFunction(hash))) {
      continue;
    }
    const object = await storage.loadObject(hash);
    const dependencyHashes = extractDependencies(object.normalizedCode);
    records.push({ hash, dependencyHashes });
    for (const dependencyHash of dependencyHashes) {
      if (!seen.has(dependencyHash)) {
        seen.add(dependencyHash);
        queue.push(dependencyHash);
      }
    }
  }

  return records;
}

export async function buildPoolDependencyGraph(storage: PoolStorage, rootHash: string): Promise<PoolDependencyGraph> {
  const records = await collectReachableRecords(storage, rootHash);
  if (records.length === 0) {
    return buildDependencyGraph([{ hash: rootHash }]);
  }
  return buildDependencyGraph(records);
}

export async function buildFullPoolDependencyGraph(storage: PoolStorage): Promise<PoolDependencyGraph | undefined> {
  const records: FunctionDependencyRecord[] = [];
  for (const hash of await storage.listFunctionHashes()) {
    const object = await storage.loadObject(hash);
    records.push({ hash, dependencyHashes: extractDependencies(object.normalizedCode) });
  }
  return records.length > 0 ? buildDependencyGraph(records) : undefined;
}

export function getDirectDependents(graph: PoolDependencyGraph, hash: string): string[] {
  return graph.nodes[hash]?.dependentHashes.slice() ?? [];
}

// Post-order: every dependency precedes its dependents; the target itself is excluded.
export function getDependencyOrder(
  graph: PoolDependencyGraph,
  hash: string,
  options: DependencyOrderOptions = {},
): string[] {
  const includeMissing = options.includeMissing ?? true;
  requireGraphNode(graph, hash);

  const state = new Map<string, "visiting" | "done">();
  const ordered: string[] = [];

  const visit = (nodeHash: string): void => {
    const node = graph.nodes[nodeHash];
    if (!node || state.has(nodeHash)) {
      return;
    }

    state.set(nodeHash, "visiting");
    for (const dependencyHash of node.dependencyHashes) {
      visit(dependencyHash);
    }
    state.set(nodeHash, "done");

    if (nodeHash !== hash && (includeMissing || node.category === "stored")) {
      ordered.push(nodeHash);
    }
  };

  visit(hash);
  return ordered;
}

function normalizeRecords(records: FunctionDependencyRecord[]): Array<{ hash: string; dependencyHashes: string[] }> {
  if (records.length === 0) {
    throw new Error("records must contain at least one function.");
  }

  const seen = new Set<string>();
  return records
    .map((record) => {
      const hash = record.hash.trim();
      if (!hash) {
        throw new Error("hash must be non-empty.");
      }
      if (seen.has(hash)) {
        throw new Error(`Duplicate function hash '${hash}'.`);
      }
      seen.add(hash);
      return { hash, dependencyHashes: uniqueSorted(record.dependencyHashes ?? []) };
    })
    .sort((left, right) => compareText(left.hash, right.hash));
}

function computeStronglyConnectedComponents(
  nodes: Record<string, DependencyGraphNode>,
  orderedHashes: string[],
): string[][] {
  let index = 0;
  const stack: string[] = [];
  const onStack = new Set<string>();
  const indexByNode = new Map<string, number>();
  const lowLinkByNode = new Map<string, number>();
  const components: string[][] = [];

  const strongConnect = (hash: string): void => {
    const nodeIndex = index;
    indexByNode.set(hash, nodeIndex);
    let lowLink = nodeIndex;
    index += 1;

    stack.push(hash);
    onStack.add(hash);

    for (const dependencyHash of nodes[hash].dependencyHashes) {
      if (!(dependencyHash in nodes)) {
        continue;
      }
      const dependencyIndex = indexByNode.get(dependencyHash);
      if (dependencyIndex === undefined) {
        strongConnect(dependencyHash);
        lowLink = Math.min(lowLink, lowLinkByNode.get(dependencyHash) ?? lowLink);
      } else if (onStack.has(dependencyHash)) {
        lowLink = Math.min(lowLink, dependencyIndex);
      }
    }
    lowLinkByNode.set(hash, lowLink);

    if (lowLink === nodeIndex) {
      const component: string[] = [];
      let current = stack.pop();
      while (current !== undefined) {
        onStack.delete(current);
        component.push(current);
        if (current === hash) {
          break;
        }
        current = stack.pop();
      }
      components.push(component.sort());
    }
  };

  for (const hash of orderedHashes) {
    if (!indexByNode.has(hash)) {
      strongConnect(hash);
    }
  }

  return components.sort((left, right) => compareText(left.join(","), right.join(",")));
}

function createNode(hash: string, category: DependencyNodeCategory): DependencyGraphNode {
  return { hash, category, dependencyHashes: [], dependentHashes: [] };
}

function requireNode(nodes: Map<string, DependencyGraphNode>, hash: string): DependencyGraphNode {
  const node = nodes.get(hash);
  if (!node) {
    throw new Error(`Function '${hash}' is not present in dependency graph.`);
  }
  return node;
}

function requireGraphNode(graph: PoolDependencyGraph, hash: string): DependencyGraphNode {
  const node = graph.nodes[hash];
  if (!node) {
    throw new Error(`Function '${hash}' is not present in dependency graph.`);
  }
  return node;
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

function compareText(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
