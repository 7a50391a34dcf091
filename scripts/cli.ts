import { InvalidArgumentError, type Command } from "commander";

export function parseNonNegativeNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError("Expected a number >= 0.");
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Expected a whole number >= 0.");
  }
  return n;
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

/**
 * Parses argv and runs the command. Ctrl-C exits with 130, anything that
 * escapes the command with 1.
 */
export function runCli(program: Command, name: string): void {
  process.on("SIGINT", () => {
    console.error("\n⛔ Interrupted");
    process.exit(130);
  });

  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(`❌ ${name} failed:`, err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
