import { join } from "path";
import type { CpuProfileCapture } from "@tickbench/core";
import { ensureDir, writeTextFile } from "./utils/fs.js";

export function cpuProfileFileName(capture: Pick<CpuProfileCapture, "strategy" | "size">): string {
  return `${capture.strategy}_${capture.size}.cpuprofile`;
}

/** Writes each capture as `<strategy>_<size>.cpuprofile` under `dir`; returns the paths. */
export function writeCpuProfiles(captures: readonly CpuProfileCapture[], dir: string): string[] {
  ensureDir(dir);
  return captures.map((capture) => {
    const path = join(dir, cpuProfileFileName(capture));
    writeTextFile(path, JSON.stringify(capture.profile));
    return path;
  });
}
