import type { Task, TaskCollection } from "../store/types.ts";

// ── ANSI color helpers ───────────────────────────────

export interface Palette {
  red: (s: string) => string;
  green: (s: string) => string;
  yellow: (s: string) => string;
}

const esc = (code: string) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;
const plain = (s: string) => s;

const COLOR: Palette = {
  red: esc("31"),
  green: esc("32"),
  yellow: esc("33"),
};

const MONOCHROME: Palette = {
  red: plain,
  green: plain,
  yellow: plain,
};

export function createPalette(enabled: boolean): Palette {
  return enabled ? COLOR : MONOCHROME;
}

// ── Task formatting ──────────────────────────────────

export function formatTaskLine(task: Task, p: Palette): string {
  const status = task.done ? p.green("Done") : p.red("Not Done");
  const deadline = task.deadline ? ` (Deadline: ${task.deadline})` : "";
  return `#${task.id}: ${task.title} [${status}]${deadline}`;
}

export function formatTaskList(tasks: TaskCollection, p: Palette): string {
  if (tasks.length === 0) return p.yellow("No tasks found");
  return ["Tasks:", ...tasks.map((t) => formatTaskLine(t, p))].join("\n");
}

// ── Help text ────────────────────────────────────────

export const USAGE = `Usage:
  add "task name" [deadline YYYY-MM-DD] - Add a new task with optional deadline
  list                                  - List all tasks
  delete <id>                           - Delete a task by ID
  done <id>                             - Mark a task as done by ID
  clear                                 - Delete all tasks`;

// ── Output helpers ───────────────────────────────────

export function print(msg: string): void {
  console.log(msg);
}

export function error(p: Palette, msg: string): void {
  console.log(`${p.red("Error:")} ${msg}`);
}
