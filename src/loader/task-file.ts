import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ParseError, ValidationError } from "../errors.js";
import { newTask, type TaskSpec } from "../planner/task-spec.js";
import { parseOrThrow, TaskFileSchema, type TaskDefinition, type TaskFile } from "../schemas.js";

/** Parse task-file text. YAML is a superset of JSON, so both are accepted. */
export function parseTaskFile(text: string, source = "task file"): TaskFile {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    throw new ParseError(`Could not parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOrThrow(TaskFileSchema, data, source);
}

export async function loadTaskFile(path: string): Promise<TaskFile> {
  const text = await readFile(path, "utf-8");
  return parseTaskFile(text, path);
}

/** Build one root spec per definition; relative `cwd` values resolve against `baseDir`. */
export function buildSpecs(defs: readonly TaskDefinition[], baseDir = process.cwd()): TaskSpec[] {
  return defs.map((def) => buildChain(def, baseDir));
}

function buildChain(def: TaskDefinition, baseDir: string): TaskSpec {
  const root = newTask(def.name, def.run, def.env, resolveCwd(def.cwd, baseDir), {
    retry: def.retry,
    killOnParentComplete: def.killOnParentComplete,
  });
  attachNested(root, def, baseDir);

  let tail = root;
  for (let stage = def.then; stage; stage = stage.then) {
    if (stage.retry || stage.killOnParentComplete) {
      throw new ValidationError(`Chained task "${stage.name}" cannot set retry or killOnParentComplete`);
    }
    tail = tail.then(stage.name, stage.run, stage.env, resolveCwd(stage.cwd, baseDir));
    attachNested(tail, stage, baseDir);
  }
  return root;
}

function attachNested(spec: TaskSpec, def: TaskDefinition, baseDir: string): void {
  for (const childDef of def.children ?? []) {
    // A child slot runs exactly one node; chains only exist at the top level.
    if (childDef.then) {
      throw new ValidationError(`Nested task "${childDef.name}" cannot have a "then" chain`);
    }
    spec.child(buildChain(childDef, baseDir));
  }
  for (const command of def.watch ?? []) {
    spec.watching(command);
  }
}

function resolveCwd(cwd: string | undefined, baseDir: string): string | undefined {
  return cwd === undefined ? undefined : resolve(baseDir, cwd);
}

/** Directory that relative paths inside the task file at `path` resolve against. */
export function taskFileDir(path: string): string {
  return dirname(resolve(path));
}
