import chalk from "chalk";

const BYTES_PER_MB = 1024 * 1024;

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(6);
}

export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(2);
}

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

export function printHeader(title: string): void {
  console.log("");
  console.log(chalk.bold.blue(`═══ ${title} ═══`));
  console.log("");
}

export function printKeyValue(key: string, value: string): void {
  console.log(`  ${chalk.dim(key)}: ${chalk.white(value)}`);
}

export function printError(message: string): void {
  console.log(chalk.red(`  ✗ ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ⚠ ${message}`));
}

/** The part of an ora spinner the abort path needs. */
export interface Spinner {
  readonly isSpinning: boolean;
  fail(text?: string): unknown;
}

/** Marks every spinner that is still running as failed. */
export function failSpinners(spinners: ReadonlyArray<Spinner | undefined>, text: string): void {
  for (const spinner of spinners) {
    if (spinner?.isSpinning) {
      spinner.fail(text);
    }
  }
}
