import { afterEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TodoError } from "../errors.ts";
import { TaskStore } from "./task-store.ts";

const createdDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "todo-store-test-"));
  createdDirs.push(dir);
  return dir;
}

async function loadError(filePath: string): Promise<TodoError> {
  try {
    await TaskStore.create(filePath);
  } catch (err) {
    if (err instanceof TodoError) return err;
    throw err;
  }
  throw new Error("expected load to fail");
}

afterEach(async () => {
  for (const dir of createdDirs.splice(0)) {
    await rm(dir, { recursive: true, force: true });
  }
});

describe("TaskStore.load", () => {
  it("returns an empty collection when the file is missing", async () => {
    const dir = await makeTempDir();
    const store = await TaskStore.create(join(dir, "tasks.txt"));
    expect(store.tasks).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
  });

  it("treats a JSON null as an empty collection", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), "null");
    const store = await TaskStore.create(join(dir, "tasks.txt"));
    expect(store.tasks).toEqual([]);
  });

  it("reads files written with timestamp deadlines", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), JSON.stringify([
      { id: 1, title: "Buy milk", done: true, deadline: "0001-01-01T00:00:00Z" },
      { id: 2, title: "Call dentist", done: false, deadline: "2024-03-15T00:00:00Z" },
      { id: 3, title: "Water plants" },
    ]));

    const store = await TaskStore.create(join(dir, "tasks.txt"));
    expect(store.tasks).toEqual([
      { id: 1, title: "Buy milk", done: true, deadline: null },
      { id: 2, title: "Call dentist", done: false, deadline: "2024-03-15" },
      { id: 3, title: "Water plants", done: false, deadline: null },
    ]);
  });

  it("fails with data corruption on invalid JSON", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), "[{ not json");

    const err = await loadError(join(dir, "tasks.txt"));
    expect(err.kind).toBe("data_corruption");
    expect(err.message.startsWith("tasks.txt is not valid JSON: ")).toBe(true);
  });

  it("fails with data corruption on an empty file", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), "");

    const err = await loadError(join(dir, "tasks.txt"));
    expect(err.kind).toBe("data_corruption");
  });

  it("drops fields it does not know", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), JSON.stringify([{ id: 1, title: "a", done: false, priority: "high" }]));

    const store = await TaskStore.create(join(dir, "tasks.txt"));
    expect(store.tasks).toEqual([{ id: 1, title: "a", done: false, deadline: null }]);
  });

  it("fails with data corruption on an id beyond the safe integer range", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), '[{"id": 9007199254740992, "title": "a", "done": false}]');

    const err = await loadError(join(dir, "tasks.txt"));
    expect(err.kind).toBe("data_corruption");
    expect(err.message.startsWith("tasks.txt has invalid task data: 0.id: ")).toBe(true);
  });

  it("fails with data corruption on records of the wrong shape", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), JSON.stringify([{ id: "a", title: "bad" }]));

    const err = await loadError(join(dir, "tasks.txt"));
    expect(err.kind).toBe("data_corruption");
    expect(err.message).toBe("tasks.txt has invalid task data: 0.id: Expected number, received string");
  });

  it("fails with data corruption on an unreadable deadline", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "tasks.txt"), JSON.stringify([{ id: 1, title: "a", deadline: "soon" }]));

    const err = await loadError(join(dir, "tasks.txt"));
    expect(err.message).toBe('tasks.txt has invalid task data: 0.deadline: Invalid deadline "soon"');
  });

  it("fails with an I/O error when the path cannot be read", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "tasks.txt"));

    const err = await loadError(join(dir, "tasks.txt"));
    expect(err.kind).toBe("io");
  });
});

describe("TaskStore.save", () => {
  it("writes pretty-printed records with a fixed field order", async () => {
    const dir = await makeTempDir();
    const filePath = join(dir, "tasks.txt");
    const store = await TaskStore.create(filePath);
    store.tasks = [
      { id: 1, title: "Buy milk", done: false, deadline: null },
      { id: 2, title: "Call dentist", done: true, deadline: "2024-03-15" },
    ];
    await store.save();

    expect(await readFile(filePath, "utf8")).toBe([
      "[",
      "  {",
      '    "id": 1,',
      '    "title": "Buy milk",',
      '    "done": false',
      "  },",
      "  {",
      '    "id": 2,',
      '    "title": "Call dentist",',
      '    "done": true,',
      '    "deadline": "2024-03-15"',
      "  }",
      "]",
    ].join("\n"));
  });

  it("round-trips through load", async () => {
    const dir = await makeTempDir();
    const filePath = join(dir, "tasks.txt");
    const tasks = [
      { id: 4, title: "b", done: true, deadline: null },
      { id: 2, title: "a", done: false, deadline: "2025-12-31" },
    ];
    const store = await TaskStore.create(filePath);
    store.tasks = tasks;
    await store.save();

    const reloaded = await TaskStore.create(filePath);
    expect(reloaded.tasks).toEqual(tasks);
  });

  it("fails with an I/O error when the file cannot be written", async () => {
    const dir = await makeTempDir();
    const store = await TaskStore.create(join(dir, "missing", "tasks.txt"));
    store.tasks = [{ id: 1, title: "a", done: false, deadline: null }];

    await expect(store.save()).rejects.toMatchObject({ kind: "io" });
  });
});
