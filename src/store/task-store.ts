import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { ZodError } from "zod";
import { TodoError, errorMessage } from "../errors.ts";
import { formatSchemaError, parsePersistedTasks, serializeTasks } from "./schema.ts";
import type { Task } from "./types.ts";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Whole-file persistence for the task collection. `tasks` holds the loaded
 * collection; callers replace it with the result of an operation and call
 * `save()`.
 */
export class TaskStore {
  tasks: Task[] = [];

  private constructor(readonly filePath: string) {}

  static async create(filePath: string): Promise<TaskStore> {
    const store = new TaskStore(filePath);
    await store.load();
    return store;
  }

  // ── Persistence ───────────────────────────────────────

  async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.tasks = [];
        return;
      }
      throw new TodoError("io", `cannot read ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }

    const name = basename(this.filePath);
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new TodoError("data_corruption", `${name} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    try {
      this.tasks = parsePersistedTasks(parsed);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new TodoError("data_corruption", `${name} has invalid task data: ${formatSchemaError(err)}`, { cause: err });
      }
      throw err;
    }
  }

  async save(): Promise<void> {
    try {
      await writeFile(this.filePath, serializeTasks(this.tasks), { mode: 0o644 });
    } catch (err) {
      throw new TodoError("io", `cannot write ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
