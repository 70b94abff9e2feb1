import { z } from "zod";
import { ZERO_TIMESTAMP, parseStoredDate } from "../utils/date.ts";
import type { Task, TaskCollection } from "./types.ts";

const deadlineSchema = z
  .string()
  .nullable()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === null || value === ZERO_TIMESTAMP) return null;
    const date = parseStoredDate(value);
    if (date === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid deadline "${value}"`,
      });
      return z.NEVER;
    }
    return date;
  });

const persistedTaskSchema = z.object({
  id: z.number().int().positive().safe(),
  title: z.string(),
  done: z.boolean().optional(),
  deadline: deadlineSchema,
});

const persistedTaskArraySchema = z.array(persistedTaskSchema).nullable();

type PersistedTaskInput = z.infer<typeof persistedTaskSchema>;

function normalizeTask(raw: PersistedTaskInput): Task {
  return {
    id: raw.id,
    title: raw.title,
    done: raw.done ?? false,
    deadline: raw.deadline,
  };
}

export function parsePersistedTasks(input: unknown): Task[] {
  const parsed = persistedTaskArraySchema.parse(input);
  return (parsed ?? []).map(normalizeTask);
}

/** Field order is fixed; tasks without a deadline omit the key. */
export function serializeTasks(tasks: TaskCollection): string {
  const records = tasks.map((t) => ({
    id: t.id,
    title: t.title,
    done: t.done,
    ...(t.deadline !== null ? { deadline: t.deadline } : {}),
  }));
  return JSON.stringify(records, null, 2);
}

export function formatSchemaError(err: z.ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
