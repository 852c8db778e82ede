import { resolve } from "node:path";
import { generateIconSet } from "@/core/icon-set";
import { DEFAULT_OUTPUT_DIR } from "@/shared/constants";
import { describeError } from "@/shared/errors";

export interface CliOptions {
  outDir: string;
  writeContents: boolean;
}

export interface CliOutput {
  log: (line: string) => void;
  error: (...values: unknown[]) => void;
}

export function parseCliArgs(args: readonly string[], cwd = process.cwd()): CliOptions {
  const positional = args.find((arg) => !arg.startsWith("--"));
  return {
    outDir: resolve(cwd, positional ?? DEFAULT_OUTPUT_DIR),
    writeContents: args.includes("--contents")
  };
}

// Resolves to the process exit status.
export async function runCli(args: readonly string[], output: CliOutput = console): Promise<number> {
  const { outDir, writeContents } = parseCliArgs(args);
  try {
    await generateIconSet(outDir, { writeContents, log: output.log });
    return 0;
  } catch (error) {
    output.error(`Icon generation failed: ${describeError(error)}`);
    if (error instanceof Error && error.cause !== undefined) {
      output.error(error.cause);
    }
    return 1;
  }
}
