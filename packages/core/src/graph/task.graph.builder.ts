import * as crypto from 'node:crypto';
import * as path from 'node:path';
import type { Budget, DependencyEdge, ResourceId, Subtask, Task } from '@tessera/shared';
import { GraphError } from '../errors.js';

export interface TaskGraph {
  task: Task;
  subtasks: Subtask[];
}

export interface BuildOptions {
  /** Defaults to a random UUID. */
  taskId?: string;
  /** Grouping key for a resource. Defaults to its directory. */
  affinity?: (resourceId: ResourceId) => string;
  /** Estimated context units needed to process a resource on its own. */
  estimateCost?: (resourceId: ResourceId) => number;
  now?: () => number;
}

/** Code-unit order; independent of the host locale. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function subtaskId(taskId: string, ordinal: number): string {
  return `${taskId}/st-${String(ordinal).padStart(3, '0')}`;
}

function defaultAffinity(resourceId: ResourceId): string {
  return path.posix.dirname(resourceId.replace(/\\/g, '/'));
}

function validate(resources: ResourceId[], edges: DependencyEdge[]): void {
  if (resources.length === 0) {
    throw new GraphError('empty', [], 'Task must name at least one resource');
  }

  const seen = new Set<ResourceId>();
  const duplicates = new Set<ResourceId>();
  for (const id of resources) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  if (duplicates.size > 0) {
    const dups = [...duplicates].sort(compareIds);
    throw new GraphError('duplicate', dups, `Duplicate resource ids: ${dups.join(', ')}`);
  }

  const unknown = new Set<ResourceId>();
  for (const [prerequisite, dependent] of edges) {
    if (!seen.has(prerequisite)) unknown.add(prerequisite);
    if (!seen.has(dependent)) unknown.add(dependent);
  }
  if (unknown.size > 0) {
    const ids = [...unknown].sort(compareIds);
    throw new GraphError(
      'unknown_resource',
      ids,
      `Dependency edges reference unknown resources: ${ids.join(', ')}`,
    );
  }

  for (const [prerequisite, dependent] of edges) {
    if (prerequisite === dependent) {
      throw new GraphError('cyclic', [prerequisite], `Resource "${prerequisite}" depends on itself`);
    }
  }
}

/**
 * Union resources of the same affinity that are joined by an edge.
 * Returns resource → smallest id of its component.
 */
function componentRoots(
  resources: ResourceId[],
  edges: DependencyEdge[],
  affinityOf: Map<ResourceId, string>,
  oversized: Set<ResourceId>,
): Map<ResourceId, ResourceId> {
  const parent = new Map<ResourceId, ResourceId>(resources.map((r) => [r, r]));

  const find = (r: ResourceId): ResourceId => {
    let root = r;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    parent.set(r, root);
    return root;
  };

  for (const [a, b] of edges) {
    if (oversized.has(a) || oversized.has(b)) continue;
    if (affinityOf.get(a) !== affinityOf.get(b)) continue;
    const ra = find(a);
    const rb = find(b);
    if (ra === rb) continue;
    // Smallest id becomes the root so the key is order-independent
    if (compareIds(ra, rb) < 0) parent.set(rb, ra);
    else parent.set(ra, rb);
  }

  return new Map(resources.map((r) => [r, find(r)]));
}

/**
 * Topological order that keeps resources of one affinity group and one
 * component adjacent where the edges allow it. Ties resolve by lower id.
 */
function orderResources(
  resources: ResourceId[],
  edges: DependencyEdge[],
  sortKey: (r: ResourceId) => string[],
): ResourceId[] {
  const indegree = new Map<ResourceId, number>(resources.map((r) => [r, 0]));
  const dependents = new Map<ResourceId, ResourceId[]>(resources.map((r) => [r, []]));
  for (const [prerequisite, dependent] of edges) {
    indegree.set(dependent, (indegree.get(dependent) ?? 0) + 1);
    dependents.get(prerequisite)?.push(dependent);
  }

  const compareKeys = (a: ResourceId, b: ResourceId): number => {
    const ka = sortKey(a);
    const kb = sortKey(b);
    for (let i = 0; i < ka.length; i++) {
      const c = compareIds(ka[i] ?? '', kb[i] ?? '');
      if (c !== 0) return c;
    }
    return 0;
  };

  const ready = resources.filter((r) => indegree.get(r) === 0).sort(compareKeys);
  const order: ResourceId[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
        ready.sort(compareKeys);
      }
    }
  }

  if (order.length < resources.length) {
    const placed = new Set(order);
    const cyclic = resources.filter((r) => !placed.has(r)).sort(compareIds);
    throw new GraphError(
      'cyclic',
      cyclic,
      `Dependency cycle detected among resources: ${cyclic.join(', ')}`,
    );
  }

  return order;
}

/**
 * Decompose a task into budget-bounded subtasks.
 *
 * Resources are laid out in a topological order that groups them by affinity
 * (directory by default) and dependency-connected component, then cut into
 * contiguous chunks of at most `budget.maxResourcesPerSubtask`. A resource
 * whose estimated cost exceeds the soft threshold becomes an oversized
 * singleton. Because every chunk is a contiguous slice of a topological order,
 * the subtask graph is acyclic and each chunk keeps its internal dependency
 * order. Identical input always produces identical output.
 */
export function buildTaskGraph(
  description: string,
  resources: ResourceId[],
  edges: DependencyEdge[],
  budget: Budget,
  options: BuildOptions = {},
): TaskGraph {
  validate(resources, edges);

  const affinity = options.affinity ?? defaultAffinity;
  const affinityOf = new Map(resources.map((r) => [r, affinity(r)]));
  const oversized = new Set(
    options.estimateCost
      ? resources.filter((r) => (options.estimateCost?.(r) ?? 0) > budget.softThreshold)
      : [],
  );
  const roots = componentRoots(resources, edges, affinityOf, oversized);

  const order = orderResources(resources, edges, (r) => [
    affinityOf.get(r) ?? '',
    roots.get(r) ?? r,
    r,
  ]);

  const chunks: Array<{ resources: ResourceId[]; oversized: boolean }> = [];
  let current: ResourceId[] = [];
  let currentAffinity: string | null = null;

  const flush = () => {
    if (current.length > 0) chunks.push({ resources: current, oversized: false });
    current = [];
    currentAffinity = null;
  };

  for (const resource of order) {
    if (oversized.has(resource)) {
      flush();
      chunks.push({ resources: [resource], oversized: true });
      continue;
    }
    const group = affinityOf.get(resource) ?? '';
    if (
      current.length >= budget.maxResourcesPerSubtask ||
      (currentAffinity !== null && currentAffinity !== group)
    ) {
      flush();
    }
    current.push(resource);
    currentAffinity = group;
  }
  flush();

  const taskId = options.taskId ?? crypto.randomUUID();
  const chunkOf = new Map<ResourceId, number>();
  chunks.forEach((chunk, i) => chunk.resources.forEach((r) => chunkOf.set(r, i)));

  const dependsOn = chunks.map(() => new Set<number>());
  for (const [prerequisite, dependent] of edges) {
    const from = chunkOf.get(prerequisite);
    const to = chunkOf.get(dependent);
    if (from !== undefined && to !== undefined && from !== to) {
      dependsOn[to]?.add(from);
    }
  }

  const subtasks: Subtask[] = chunks.map((chunk, i) => ({
    id: subtaskId(taskId, i + 1),
    taskId,
    resources: chunk.resources,
    dependsOn: [...(dependsOn[i] ?? [])].sort((a, b) => a - b).map((j) => subtaskId(taskId, j + 1)),
    sessionId: null,
    status: 'pending',
    oversized: chunk.oversized,
    attempts: 0,
    completedResources: [],
    origin: null,
    diagnostic: null,
  }));

  const task: Task = {
    id: taskId,
    description,
    resources: [...resources],
    edges: edges.map(([p, d]): DependencyEdge => [p, d]),
    status: 'planned',
    subtaskIds: subtasks.map((s) => s.id),
    createdAt: (options.now ?? Date.now)(),
    completedAt: null,
    diagnostic: null,
  };

  return { task, subtasks };
}
