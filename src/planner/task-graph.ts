import { CyclicDependencyError, DiscoveryError } from "../errors.js";
import type { TaskLike } from "../task/types.js";
import { log } from "../utils/logger.js";
import type { Dag, TaskNode } from "./types.js";

const dagLog = log.child("dag");

function createNode(task: TaskLike): TaskNode {
  return {
    key: task.key,
    task,
    dependencies: [],
    dependents: new Set(),
    status: "pending",
    pendingDependents: 0,
    cleanup: typeof task.cleanup === "function" ? "waiting" : "none",
  };
}

async function evaluate<T>(node: TaskNode, phase: "done" | "requires", fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new DiscoveryError(node.key, phase, err);
  }
}

/**
 * Discover the graph reachable from `roots`. Equal tasks collapse to one node,
 * tasks that are already done are not expanded, and a cycle on the active
 * discovery chain fails the whole build.
 */
export async function mkDag(...roots: TaskLike[]): Promise<Dag> {
  const nodes = new Map<string, TaskNode>();
  const chain: string[] = [];
  const onChain = new Set<string>();

  async function visit(task: TaskLike): Promise<TaskNode> {
    const key = task.key;
    if (onChain.has(key)) {
      throw new CyclicDependencyError([...chain.slice(chain.indexOf(key)), key]);
    }
    const existing = nodes.get(key);
    if (existing) return existing;

    const node = createNode(task);
    nodes.set(key, node);

    if (await evaluate(node, "done", () => task.done())) {
      node.status = "already-done";
      dagLog.debug(`${key} already done`);
      return node;
    }

    chain.push(key);
    onChain.add(key);
    const required = await evaluate(node, "requires", () => task.requires());
    for (const req of required) {
      const dep = await visit(req);
      if (!dep.dependents.has(node)) {
        node.dependencies.push(dep);
        dep.dependents.add(node);
      }
    }
    chain.pop();
    onChain.delete(key);
    return node;
  }

  const rootNodes: TaskNode[] = [];
  for (const root of roots) {
    const node = await visit(root);
    if (!rootNodes.includes(node)) rootNodes.push(node);
  }

  for (const node of nodes.values()) {
    node.pendingDependents = node.dependents.size;
  }

  const order = topologicalSort(nodes.values());
  dagLog.debug("Graph built", {
    nodes: order.length,
    alreadyDone: order.filter((n) => n.status === "already-done").length,
  });
  return { nodes, order, roots: rootNodes };
}

/** Kahn's algorithm: repeatedly take the nodes whose dependencies are all placed. */
export function topologicalSort(nodes: Iterable<TaskNode>): TaskNode[] {
  const all = [...nodes];
  const unresolved = new Map<TaskNode, number>();
  const queue: TaskNode[] = [];
  for (const node of all) {
    unresolved.set(node, node.dependencies.length);
    if (node.dependencies.length === 0) queue.push(node);
  }

  const sorted: TaskNode[] = [];
  for (let i = 0; i < queue.length; i++) {
    const node = queue[i];
    sorted.push(node);
    for (const dependent of node.dependents) {
      const left = (unresolved.get(dependent) ?? 0) - 1;
      unresolved.set(dependent, left);
      if (left === 0) queue.push(dependent);
    }
  }

  if (sorted.length !== all.length) {
    const stuck = all.filter((n) => (unresolved.get(n) ?? 0) > 0).map((n) => n.key);
    throw new CyclicDependencyError(stuck);
  }
  return sorted;
}

/** Human-readable listing: each node, `<=` its dependencies, `=>` its dependents. */
export function describeDag(dag: Dag): string {
  const lines: string[] = [];
  for (const node of dag.order) {
    lines.push(`${node.key} [${node.status}]`);
    for (const dep of node.dependencies) lines.push(`\t<= ${dep.key}`);
    for (const dependent of node.dependents) lines.push(`\t=> ${dependent.key}`);
  }
  return lines.join("\n");
}
