#!/usr/bin/env node

/**
 * jozin CLI
 * Scans photo folders and keeps JSON sidecars next to every image
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import chalk from "chalk";
import { z } from "zod";

import { runScan, runCleanup, type ScanCommandOptions } from "./src/scan-runner.js";
import type { CleanupTarget } from "./src/core/cleanup/cleanup-manager.js";
import { UserError, toJozinError } from "./src/utils/error-handler.js";
import { getOptimalConcurrency, MAX_THREADS_LIMIT } from "./src/utils/env-utils.js";
import { VERSION } from "./src/version.js";

/**
 * Split a comma separated pattern list. An empty list is a user error.
 */
export const parsePatternList = (value: string | undefined, flag: string): string[] | undefined => {
  if (value === undefined) {
    return undefined;
  }
  const patterns = value.split(",").map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
  if (patterns.length === 0) {
    throw new UserError(`${flag} patterns cannot be empty`);
  }
  return patterns;
};

// Zod schemas for CLI validation
const OutputSchema = z.object({
  json: z.boolean().optional(),
  quiet: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export const ScanArgsSchema = OutputSchema.extend({
  path: z.string().min(1, "Path is required"),
  recursive: z.boolean().optional(),
  include: z.string().optional(),
  exclude: z.string().optional(),
  "dry-run": z.boolean().optional(),
  "max-threads": z.coerce
    .number()
    .int("max-threads must be an integer")
    .min(1, "max-threads must be greater than 0")
    .max(MAX_THREADS_LIMIT)
    .optional(),
});

export const CleanupArgsSchema = OutputSchema.extend({
  path: z.string().min(1, "Path is required"),
  recursive: z.boolean().optional(),
  "dry-run": z.boolean().optional(),
  "only-sidecars": z.boolean().optional(),
  "only-backups": z.boolean().optional(),
  "only-thumbnails": z.boolean().optional(),
  "only-cache": z.boolean().optional(),
}).refine(
  (args) =>
    [args["only-sidecars"], args["only-backups"], args["only-thumbnails"], args["only-cache"]].filter(Boolean).length <= 1,
  { message: "only one --only-* flag may be given" }
);

type ParsedArgs = ReturnType<typeof parse>;

// Parse command line arguments
export function parse(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      recursive: { type: "boolean", short: "r" },
      include: { type: "string" },
      exclude: { type: "string" },
      "dry-run": { type: "boolean" },
      "max-threads": { type: "string" },
      "only-sidecars": { type: "boolean" },
      "only-backups": { type: "boolean" },
      "only-thumbnails": { type: "boolean" },
      "only-cache": { type: "boolean" },
      json: { type: "boolean" },
      quiet: { type: "boolean" },
      verbose: { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    allowPositionals: true,
  });

  return {
    ...values,
    command: positionals[0],
    path: positionals[1],
  };
}

const validate = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const errorMessages = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("\n");
    throw new UserError(`Validation failed:\n${errorMessages}`);
  }
  return parsed.data;
};

// JSON when asked for or when stdout is not a terminal
const wantsJson = (json: boolean | undefined): boolean => json === true || !process.stdout.isTTY;

// Display help information
function showHelp() {
  console.log(`
${chalk.bold(`jozin v${VERSION} - Local photo organizer`)}

Scans folders of images, hashes every file and writes a JSON sidecar next to
each image. Originals are never modified.

${chalk.bold("Commands:")}
  scan <path>       Scan a file or directory and write sidecars
  cleanup <path>    Remove generated sidecars, backups, thumbnails and caches

${chalk.bold("Scan Options:")}
  -r, --recursive         Descend into subdirectories
  --include=<patterns>    Comma separated globs; only matching files are scanned
  --exclude=<patterns>    Comma separated globs; matching files are skipped
  --dry-run               Compute everything but write nothing
  --max-threads=<n>       Files scanned concurrently (default: 2x CPU cores, max 8)

${chalk.bold("Cleanup Options:")}
  -r, --recursive         Descend into subdirectories
  --dry-run               List files that would be removed
  --only-sidecars         Remove only *.json sidecars
  --only-backups          Remove only *.json.bak1-3 backups and *.json.tmp leftovers
  --only-thumbnails       Remove only <name>_<size>.jpg|webp thumbnails
  --only-cache            Remove only .jozin cache directories

${chalk.bold("Global Options:")}
  --json                  Print JSON (default when stdout is not a terminal)
  --quiet                 Show only errors and the summary
  --verbose               Show per-file details
  --help, -h              Show this help message
  --version, -v           Show version information

${chalk.bold("Examples:")}
  jozin scan ~/Photos --recursive --dry-run
  jozin scan ~/Photos -r --include "*.jpg,*.jpeg"
  jozin scan ~/Photos -r --exclude "**/.*/**" --max-threads 4
  jozin cleanup ~/Photos -r --only-backups
`);
}

// Show version information
function showVersion() {
  console.log(`jozin v${VERSION}`);
}

// Unified error handler: structured JSON on stderr, exit code by error kind
const handleCliError = (error: unknown): never => {
  const jozinError = toJozinError(error);
  console.error(JSON.stringify(jozinError.toJSON(), null, 2));
  process.exit(jozinError.exitCode);
};

export const toScanCommandOptions = (args: ParsedArgs): { path: string; options: ScanCommandOptions } => {
  const validated = validate(ScanArgsSchema, args);
  return {
    path: validated.path,
    options: {
      recursive: validated.recursive,
      include: parsePatternList(validated.include, "include"),
      exclude: parsePatternList(validated.exclude, "exclude"),
      dryRun: validated["dry-run"],
      // Resolved once here and passed down explicitly
      maxThreads: getOptimalConcurrency(validated["max-threads"]),
      json: wantsJson(validated.json),
      quiet: validated.quiet,
      verbose: validated.verbose,
    },
  };
};

// Handle scan command
async function handleScan(args: ParsedArgs): Promise<void> {
  const { path: targetPath, options } = toScanCommandOptions(args);
  await runScan(targetPath, options);
}

export const toCleanupTarget = (args: {
  "only-sidecars"?: boolean;
  "only-backups"?: boolean;
  "only-thumbnails"?: boolean;
  "only-cache"?: boolean;
}): CleanupTarget => {
  if (args["only-sidecars"]) return "sidecars";
  if (args["only-backups"]) return "backups";
  if (args["only-thumbnails"]) return "thumbnails";
  if (args["only-cache"]) return "cache";
  return "all";
};

// Handle cleanup command
async function handleCleanup(args: ParsedArgs): Promise<void> {
  const validated = validate(CleanupArgsSchema, args);

  await runCleanup(validated.path, {
    recursive: validated.recursive,
    dryRun: validated["dry-run"],
    target: toCleanupTarget(validated),
    json: wantsJson(validated.json),
    quiet: validated.quiet,
    verbose: validated.verbose,
  });
}

// Main function
export async function main(rawArgs: string[]): Promise<void> {
  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    showHelp();
    return;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    showVersion();
    return;
  }

  let args: ParsedArgs;
  try {
    args = parse(rawArgs);
  } catch (error) {
    throw new UserError(error instanceof Error ? error.message : String(error));
  }

  switch (args.command) {
    case "scan":
      await handleScan(args);
      break;

    case "cleanup":
      await handleCleanup(args);
      break;

    default:
      throw new UserError(`Unknown command "${args.command ?? ""}"`);
  }
}

/**
 * Whether this module is the script node was asked to run. npm installs the
 * bin as a symlink, so the invoked path is resolved before comparing.
 */
export const isEntryPoint = (invokedPath: string | undefined, moduleUrl: string): boolean => {
  if (invokedPath === undefined) {
    return false;
  }
  try {
    return fs.realpathSync(invokedPath) === fs.realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
};

if (isEntryPoint(process.argv[1], import.meta.url)) {
  main(process.argv.slice(2)).catch(handleCliError);
}
