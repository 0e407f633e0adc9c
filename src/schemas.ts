import { z } from "zod";
import { ValidationError, type TaskTreeError } from "./errors.js";
import type { TaskResult } from "./planner/types.js";

export const RunConfigSchema = z
  .object({
    maxWorkers: z.number().int().positive(),
    outputLines: z.number().int().nonnegative(),
    errorLines: z.number().int().nonnegative(),
    failFast: z.boolean(),
    raiseOnFailure: z.boolean(),
  })
  .partial()
  .strict();

export type RunConfigOverrides = z.infer<typeof RunConfigSchema>;

/** One task entry of a task file. `then` continues the chain, `children` nest. */
export type TaskDefinition = {
  name: string;
  run: string;
  env?: Record<string, string>;
  cwd?: string;
  retry?: boolean;
  killOnParentComplete?: boolean;
  watch?: string[];
  children?: TaskDefinition[];
  then?: TaskDefinition;
};

export const TaskDefinitionSchema: z.ZodType<TaskDefinition> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1, "name must not be empty"),
      run: z.string().min(1, "run must not be empty"),
      env: z.record(z.string()).optional(),
      cwd: z.string().optional(),
      retry: z.boolean().optional(),
      killOnParentComplete: z.boolean().optional(),
      watch: z.array(z.string().min(1)).optional(),
      children: z.array(TaskDefinitionSchema).optional(),
      then: TaskDefinitionSchema.optional(),
    })
    .strict(),
);

export const TaskFileSchema = z
  .object({
    config: RunConfigSchema.optional(),
    tasks: z.array(TaskDefinitionSchema).min(1, "at least one task is required"),
  })
  .strict();

export type TaskFile = z.infer<typeof TaskFileSchema>;

/** A stored result tree, as read back from run history. */
export const TaskResultSchema: z.ZodType<TaskResult> = z.lazy(() =>
  z.object({
    name: z.string(),
    status: z.enum(["pending", "running", "success", "failed"]),
    ok: z.boolean(),
    exitCode: z.number().int(),
    stdout: z.string(),
    stderr: z.string(),
    durationMs: z.number(),
    children: z.array(TaskResultSchema),
  }),
);

export const TaskResultListSchema = z.array(TaskResultSchema);

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Parse `data` or throw a TaskTreeError (ValidationError by default) listing every issue. */
export function parseOrThrow<T>(
  schema: z.ZodType<T>,
  data: unknown,
  label: string,
  makeError: (message: string) => TaskTreeError = (message) => new ValidationError(message),
): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw makeError(`Invalid ${label}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
