import { CommanderError } from "commander";
import type { Command } from "commander";
import { isNotImplementedError } from "@steadyplan/schemas";

export function describeError(err: unknown): string {
  if (isNotImplementedError(err)) return `${err.name}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

// Global error handlers for unhandled rejections and exceptions
export function installProcessHandlers(): void {
  process.on("unhandledRejection", (reason) => {
    console.error("[steadyplan] Unhandled rejection:", reason);
    process.exit(1);
  });
  process.on("uncaughtException", (err) => {
    console.error("[steadyplan] Uncaught exception:", err);
    process.exit(1);
  });
}

/**
 * Parses `argv` and runs the matched action. Resolves to the exit code:
 * 0 on success, the commander exit code for usage errors (when the program
 * uses exitOverride), 1 for anything the action throws.
 */
export async function runProgram(program: Command, argv: string[] = process.argv): Promise<number> {
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    console.error(`[steadyplan] ${describeError(err)}`);
    return 1;
  }
}
