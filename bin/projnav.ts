#!/usr/bin/env tsx
import { ConfigError } from "../src/config.ts";
import { GitError } from "../src/git.ts";
import { main } from "../src/main.ts";

try {
  await main(process.argv.slice(2));
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  const stderr = err instanceof GitError ? err.stderr.trim() : "";
  process.stderr.write(`projnav: ${message}\n`);
  if (stderr) process.stderr.write(stderr + "\n");
  if (err instanceof ConfigError) process.stderr.write(`Fix or remove ${err.filePath} and try again.\n`);
  process.exit(1);
}
