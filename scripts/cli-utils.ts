// scripts/cli-utils.ts
import { config as loadEnv } from "dotenv";
import { InvalidArgumentError } from "commander";
import { errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logging/logger";

export function loadEnvFiles() {
  loadEnv({ path: [".env.local", ".env"] });
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

/** Runs a CLI entry point; failures are logged and set a non-zero exit code. */
export function runMain(main: () => Promise<void>, logger: Logger) {
  main().catch((err: unknown) => {
    logger.error("cli.failed", { error: errorMessage(err) });
    process.exitCode = 1;
  });
}
