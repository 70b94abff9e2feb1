import { resolve } from "node:path";
import type { ConfigSources, TodoConfig } from "./types.ts";

export const DATA_FILE_NAME = "tasks.txt";

export function getDataFilePath(cwd: string): string {
  return resolve(cwd, DATA_FILE_NAME);
}

export function resolveConfig(sources: ConfigSources): TodoConfig {
  return {
    dataFile: getDataFilePath(sources.cwd),
    color: sources.isTTY && !sources.noColorFlag,
  };
}
