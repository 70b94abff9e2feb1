import { resolveConfig } from "../config/config.ts";
import type { TodoConfig } from "../config/types.ts";
import { TodoError, errorMessage, isTodoError } from "../errors.ts";
import { addTask, clearTasks, markDone, removeTask } from "../store/operations.ts";
import { TaskStore } from "../store/task-store.ts";
import {
  USAGE, createPalette, error, formatTaskList, print,
  type Palette,
} from "./format.ts";

// ── Exit codes ───────────────────────────────────────

const EXIT_OK = 0;
const EXIT_USAGE = 1;
const EXIT_NOT_FOUND = 2;
const EXIT_CORRUPT = 3;
const EXIT_IO = 4;

function exitCodeFor(err: unknown): number {
  if (!isTodoError(err)) return EXIT_USAGE;
  switch (err.kind) {
    case "usage": return EXIT_USAGE;
    case "not_found": return EXIT_NOT_FOUND;
    case "data_corruption": return EXIT_CORRUPT;
    case "io": return EXIT_IO;
  }
}

// ── Arg parsing helpers ──────────────────────────────

const NO_COLOR_FLAG = "--no-color";

function requireId(raw: string | undefined): number {
  if (raw === undefined) {
    throw new TodoError("usage", "Task ID is required", { showUsage: true });
  }
  if (!/^[+-]?\d+$/.test(raw)) {
    throw new TodoError("usage", "ID must be a number");
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new TodoError("usage", "ID must be a number");
  }
  return id;
}

function notFound(id: number): TodoError {
  return new TodoError("not_found", `Task #${id} not found`);
}

// ── Subcommand handlers ──────────────────────────────

interface Context {
  config: TodoConfig;
  p: Palette;
}

async function cmdAdd(ctx: Context, args: string[]): Promise<number> {
  const [title, deadline] = args;
  if (!title) {
    throw new TodoError("usage", "Task title is required", { showUsage: true });
  }

  const store = await TaskStore.create(ctx.config.dataFile);
  const result = addTask(store.tasks, title, deadline);
  store.tasks = result.tasks;
  await store.save();

  print(`${ctx.p.green(`Added task #${result.id}:`)} ${title}`);
  const added = result.tasks.find((t) => t.id === result.id);
  if (deadline && added?.deadline === null) {
    print(`${ctx.p.yellow("Warning:")} ignoring invalid deadline "${deadline}" (expected YYYY-MM-DD)`);
  }
  return EXIT_OK;
}

async function cmdList(ctx: Context): Promise<number> {
  const store = await TaskStore.create(ctx.config.dataFile);
  print(formatTaskList(store.tasks, ctx.p));
  return EXIT_OK;
}

async function cmdDelete(ctx: Context, args: string[]): Promise<number> {
  const id = requireId(args[0]);

  const store = await TaskStore.create(ctx.config.dataFile);
  const result = removeTask(store.tasks, id);
  if (!result.found) throw notFound(id);
  store.tasks = result.tasks;
  await store.save();

  print(ctx.p.red(`Deleted task #${id}`));
  return EXIT_OK;
}

async function cmdDone(ctx: Context, args: string[]): Promise<number> {
  const id = requireId(args[0]);

  const store = await TaskStore.create(ctx.config.dataFile);
  const result = markDone(store.tasks, id);
  if (!result.found) throw notFound(id);
  store.tasks = result.tasks;
  await store.save();

  print(ctx.p.green(`Marked task #${id} as done`));
  return EXIT_OK;
}

async function cmdClear(ctx: Context): Promise<number> {
  const store = await TaskStore.create(ctx.config.dataFile);
  store.tasks = clearTasks();
  await store.save();

  print(ctx.p.yellow("All tasks cleared!"));
  return EXIT_OK;
}

// ── Entry point ──────────────────────────────────────

export interface RunOptions {
  /** Directory holding the task file. Defaults to the process working directory. */
  cwd?: string;
  isTTY?: boolean;
}

export async function runCLI(args: string[], options: RunOptions = {}): Promise<number> {
  // Global flags are only read before the subcommand; later tokens are arguments.
  let start = 0;
  while (args[start] === NO_COLOR_FLAG) start++;
  const config = resolveConfig({
    cwd: options.cwd ?? process.cwd(),
    isTTY: options.isTTY ?? process.stdout.isTTY === true,
    noColorFlag: start > 0,
  });
  const ctx: Context = { config, p: createPalette(config.color) };

  const [subcommand, ...rest] = args.slice(start);

  try {
    switch (subcommand) {
      case "add": return await cmdAdd(ctx, rest);
      case "list": return await cmdList(ctx);
      case "delete": return await cmdDelete(ctx, rest);
      case "done": return await cmdDone(ctx, rest);
      case "clear": return await cmdClear(ctx);
      default:
        print(USAGE);
        return EXIT_USAGE;
    }
  } catch (err) {
    error(ctx.p, errorMessage(err));
    if (isTodoError(err) && err.showUsage) print(USAGE);
    return exitCodeFor(err);
  }
}
