import type { TaskSpec } from "./task-spec.js";

/** Flatten the `then` chain a node belongs to, starting from its root. */
export function flattenChain(spec: TaskSpec): TaskSpec[] {
  return [...spec.chainStages()];
}

/**
 * Group root chains into depth batches: batch `d` holds stage `d` of every
 * chain long enough to have one. Roots keep their input order inside each
 * batch.
 */
export function planBatches(roots: readonly TaskSpec[]): TaskSpec[][] {
  const chains = roots.map(flattenChain);
  const maxDepth = chains.reduce((max, chain) => Math.max(max, chain.length), 0);

  const batches: TaskSpec[][] = [];
  for (let depth = 0; depth < maxDepth; depth++) {
    const batch: TaskSpec[] = [];
    for (const chain of chains) {
      const stage = chain[depth];
      if (stage) batch.push(stage);
    }
    batches.push(batch);
  }
  return batches;
}

/** Number of runtime tasks a spec expands into: itself plus every descendant. */
export function countTasks(spec: TaskSpec): number {
  return spec.children.reduce((sum, child) => sum + countTasks(child), 1);
}

export type PlannedTask = {
  name: string;
  kind: TaskSpec["kind"];
  killOnParentComplete: boolean;
  children: PlannedTask[];
};

export type PlannedBatch = {
  depth: number;
  tasks: PlannedTask[];
};

function describeTask(spec: TaskSpec): PlannedTask {
  return {
    name: spec.name,
    kind: spec.kind,
    killOnParentComplete: spec.killOnParentComplete,
    children: spec.children.map(describeTask),
  };
}

/** Serializable view of the batches `planBatches` would run (for dry runs). */
export function describePlan(roots: readonly TaskSpec[]): PlannedBatch[] {
  return planBatches(roots).map((batch, depth) => ({
    depth,
    tasks: batch.map(describeTask),
  }));
}
