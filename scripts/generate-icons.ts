import { runCli } from "../src/core/cli.js";

// Usage: tsx scripts/generate-icons.ts [outDir] [--contents]
process.exitCode = await runCli(process.argv.slice(2));
