import { join } from "path";
import { homedir } from "os";

/** `TICKBENCH_HOME`, or `~/.tickbench`. */
export function getTickbenchDir(): string {
  return process.env.TICKBENCH_HOME || join(homedir(), ".tickbench");
}

export function getLogsDir(): string {
  return join(getTickbenchDir(), "logs");
}

export function getConfigPath(): string {
  return join(getTickbenchDir(), "config.json");
}
