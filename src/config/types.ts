export interface TodoConfig {
  /** Absolute path of the task file. */
  dataFile: string;
  /** Whether ANSI colors are written to the terminal. */
  color: boolean;
}

export interface ConfigSources {
  cwd: string;
  isTTY: boolean;
  noColorFlag: boolean;
}
