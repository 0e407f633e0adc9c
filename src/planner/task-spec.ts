import { ValidationError } from "../errors.js";
import type { TaskAction, TaskOptions } from "./types.js";

/**
 * Arena for one sequential chain. Stage order is chain order; a node finds
 * its continuation and its root through the arena rather than through
 * pointers to other nodes.
 */
export class TaskChain {
  private readonly nodes: TaskSpec[] = [];

  attach(spec: TaskSpec): number {
    this.nodes.push(spec);
    return this.nodes.length - 1;
  }

  /** Drop every stage after `index`, so a new continuation can take its place. */
  truncateAfter(index: number): void {
    this.nodes.length = index + 1;
  }

  at(index: number): TaskSpec | undefined {
    return this.nodes[index];
  }

  get stages(): readonly TaskSpec[] {
    return this.nodes;
  }
}

/**
 * Declarative description of one unit of work and its structural relations:
 * a sequential continuation (`then`), parallel nested children (`child`) and
 * watchers (`watching`).
 */
export class TaskSpec {
  readonly name: string;
  readonly action: TaskAction;
  readonly env: Readonly<Record<string, string>>;
  readonly cwd?: string;
  readonly retry: boolean;
  readonly killOnParentComplete: boolean;

  private readonly chain: TaskChain;
  private readonly index: number;
  private readonly childSpecs: TaskSpec[] = [];

  constructor(
    name: string,
    action: TaskAction,
    env?: Record<string, string>,
    cwd?: string,
    options?: TaskOptions,
    chain?: TaskChain,
  ) {
    if (typeof name !== "string" || name.trim() === "") {
      throw new ValidationError("Task name must be a non-empty string");
    }
    if (typeof action === "string") {
      if (action.trim() === "") {
        throw new ValidationError(`Task "${name}" has an empty command`);
      }
    } else if (typeof action !== "function") {
      throw new ValidationError(`Task "${name}" needs a command string or a callback`);
    }
    if (options?.retry && typeof action !== "string") {
      throw new ValidationError(`Task "${name}" retries, so its action must be a command`);
    }

    this.name = name;
    this.action = action;
    this.env = Object.freeze({ ...env });
    this.cwd = cwd;
    this.retry = options?.retry ?? false;
    this.killOnParentComplete = options?.killOnParentComplete ?? false;
    this.chain = chain ?? new TaskChain();
    this.index = this.chain.attach(this);
  }

  /** Chain a task to run after this one completes. Returns the new tail. */
  then(name: string, action: TaskAction, env?: Record<string, string>, cwd?: string): TaskSpec {
    this.chain.truncateAfter(this.index);
    return new TaskSpec(name, action, env, cwd, undefined, this.chain);
  }

  /** Add a child that runs alongside this task. Returns `this`. */
  child(spec: TaskSpec): this {
    if (spec === this || spec.contains(this)) {
      throw new ValidationError(`Task "${spec.name}" cannot be nested under itself`);
    }
    this.childSpecs.push(spec);
    return this;
  }

  /** Add a background watcher: retried until ready, killed when this task's action completes. */
  watching(command: string): this {
    return this.child(
      new TaskSpec(command, command, undefined, undefined, {
        retry: true,
        killOnParentComplete: true,
      }),
    );
  }

  get children(): readonly TaskSpec[] {
    return this.childSpecs;
  }

  get next(): TaskSpec | undefined {
    return this.chain.at(this.index + 1);
  }

  /** First stage of the chain this node belongs to. */
  get root(): TaskSpec {
    return this.chain.at(0) ?? this;
  }

  /** Zero-based position of this node in its chain. */
  get depth(): number {
    return this.index;
  }

  /** Every stage of this node's chain, root first. */
  chainStages(): readonly TaskSpec[] {
    return [...this.chain.stages];
  }

  get kind(): "callback" | "command" | "watcher" {
    if (typeof this.action === "function") return "callback";
    return this.retry ? "watcher" : "command";
  }

  private contains(spec: TaskSpec): boolean {
    return this.childSpecs.some((c) => c === spec || c.contains(spec));
  }
}

/**
 * Create a task.
 *
 * @example
 * newTask("build", "npm run build").then("test", "npm test");
 * newTask("server", "npm start").watching("tail -f server.log");
 */
export function newTask(
  name: string,
  action: TaskAction,
  env?: Record<string, string>,
  cwd?: string,
  options?: TaskOptions,
): TaskSpec {
  return new TaskSpec(name, action, env, cwd, options);
}
