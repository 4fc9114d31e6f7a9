import { existsSync, mkdirSync, writeFileSync } from "fs";

export function ensureDir(path: string, mode: number = 0o755): void {
  if (!existsSync(path)) {
    mkdirSync(path, { mode, recursive: true });
  }
}

export function writeTextFile(path: string, content: string): void {
  writeFileSync(path, content, { encoding: "utf-8" });
}

export function writeJsonFile<T>(path: string, data: T): void {
  writeFileSync(path, JSON.stringify(data, null, 2) + "\n", { encoding: "utf-8" });
}
