import type { DastoreConfig } from "./utils/dotenv-config.js";
import { DastoreError, errorMessage } from "./utils/errors.js";
import { createSubLogger } from "./utils/logger.js";
import {
  MIN_QUERY_LENGTH,
  assertPackageName,
  type PackageInfo,
  type PackageManager,
} from "./utils/pacman.js";
import type { PackageQueue } from "./utils/queue.js";
import type { CommandRunner } from "./utils/system.js";
import {
  executeOperation,
  installQueue,
  operationTitle,
  transactionLogsDir,
  type OperationRequest,
  type TransactionOptions,
  type TransactionResult,
} from "./utils/transaction.js";

const log = createSubLogger("commands");

export const DESCRIPTION_LIMIT = 80;

export interface CommandContext {
  config: DastoreConfig;
  runner: CommandRunner;
  manager: PackageManager;
  queue: PackageQueue;
  /** Prints one line of user-facing output */
  print: (line: string) => void;
  printError: (line: string) => void;
  /** Streams raw transaction output */
  write: (text: string) => void;
  confirm: (question: string) => Promise<boolean>;
  /** Runs the installer, returning its exit code */
  setup: () => Promise<number>;
  signal?: AbortSignal;
}

export interface ParsedArgs {
  command: string | undefined;
  args: string[];
  yes: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: undefined,
    args: [],
    yes: false,
    verbose: false,
    help: false,
    version: false,
  };

  for (const arg of argv) {
    if (arg === "--yes" || arg === "-y") {
      parsed.yes = true;
    } else if (arg === "--verbose") {
      parsed.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (parsed.command === undefined) {
      parsed.command = arg;
    } else {
      parsed.args.push(arg);
    }
  }

  return parsed;
}

export function truncateDescription(description: string, limit = DESCRIPTION_LIMIT): string {
  return description.length > limit ? `${description.slice(0, limit)}...` : description;
}

export function formatPackageRow(pkg: PackageInfo): string[] {
  let header = `${pkg.name} ${pkg.version} • ${pkg.repo}`;
  if (pkg.updateAvailable) {
    header += " [update available]";
  } else if (pkg.installed) {
    header += " [installed]";
  }
  const lines = [header];
  if (pkg.description) {
    lines.push(`    ${truncateDescription(pkg.description)}`);
  }
  return lines;
}

export function formatPackageDetails(pkg: PackageInfo): string[] {
  const lines = [pkg.name, `Version: ${pkg.version}`];
  if (pkg.description) {
    lines.push(pkg.description);
  }

  const info: Array<[string, string]> = [
    ["Repository", pkg.repo],
    ["Download Size", pkg.size],
    ["Installed Size", pkg.installedSize],
    ["License", pkg.licenses.join(", ")],
    ["URL", pkg.url],
    ["Depends On", pkg.depends.join(", ")],
    ["Groups", pkg.groups.join(", ")],
  ];
  lines.push("", "Information");
  for (const [label, value] of info) {
    if (value) {
      lines.push(`  ${label}: ${value}`);
    }
  }
  lines.push(`  Status: ${pkg.installed ? "Installed" : "Not installed"}`);
  return lines;
}

function exitCodeFor(result: TransactionResult): number {
  switch (result.status) {
    case "succeeded":
      return 0;
    case "cancelled":
      return 130;
    case "failed":
      return result.exitCode && result.exitCode > 0 ? result.exitCode : 1;
  }
}

function transactionOptions(ctx: CommandContext, verbose: boolean): TransactionOptions {
  let lastStatus = "";
  return {
    runner: ctx.runner,
    elevateCommand: ctx.config.elevateCommand,
    logsDir: transactionLogsDir(ctx.config.stateDir),
    signal: ctx.signal,
    onProgress: ({ fraction, status }) => {
      if (status !== lastStatus) {
        lastStatus = status;
        ctx.print(`${Math.floor(fraction * 100)}% ${status}`);
      }
    },
    onOutput: verbose ? ctx.write : undefined,
  };
}

function reportResult(ctx: CommandContext, result: TransactionResult): number {
  if (result.logFile) {
    ctx.print(`Log: ${result.logFile}`);
  }
  return exitCodeFor(result);
}

async function runOperation(
  ctx: CommandContext,
  request: OperationRequest,
  verbose: boolean
): Promise<number> {
  ctx.print(operationTitle(request));
  const result = await executeOperation(request, transactionOptions(ctx, verbose));
  return reportResult(ctx, result);
}

function requireName(args: string[], usage: string): string {
  const [name] = args;
  if (!name) {
    throw new DastoreError(`Usage: ${usage}`);
  }
  return assertPackageName(name);
}

async function searchCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const query = args.join(" ").trim();
  if (query.length < MIN_QUERY_LENGTH) {
    throw new DastoreError(`Search query must be at least ${MIN_QUERY_LENGTH} characters`);
  }

  const packages = await ctx.manager.search(query);
  if (packages.length === 0) {
    ctx.print("No packages found");
    return 0;
  }
  for (const pkg of packages) {
    for (const line of formatPackageRow(pkg)) {
      ctx.print(line);
    }
  }
  return 0;
}

async function infoCommand(ctx: CommandContext, args: string[]): Promise<number> {
  const details = await ctx.manager.details(requireName(args, "dastore info <package>"));
  for (const line of formatPackageDetails(details)) {
    ctx.print(line);
  }
  return 0;
}

async function upgradeCommand(ctx: CommandContext, parsed: ParsedArgs): Promise<number> {
  if (!parsed.yes && !(await ctx.confirm("Do you want to update all packages?"))) {
    ctx.print("System update cancelled");
    return 0;
  }
  return runOperation(ctx, { type: "system_update" }, parsed.verbose);
}

async function queueCommand(ctx: CommandContext, parsed: ParsedArgs): Promise<number> {
  const [action = "list", ...names] = parsed.args;
  const { queue } = ctx;

  switch (action) {
    case "list": {
      if (queue.size === 0) {
        ctx.print("Queue is empty");
        return 0;
      }
      for (const pkg of queue.packages) {
        for (const line of formatPackageRow(pkg)) {
          ctx.print(line);
        }
      }
      return 0;
    }

    case "add": {
      requireName(names, "dastore queue add <package...>");
      for (const name of names) {
        const pkg = await ctx.manager.details(name);
        if (pkg.installed) {
          ctx.print(`${name} is already installed`);
        } else if (queue.add(pkg)) {
          ctx.print(`Added ${name} to queue`);
        } else {
          ctx.print(`${name} is already in the queue`);
        }
      }
      return 0;
    }

    case "remove": {
      requireName(names, "dastore queue remove <package...>");
      for (const name of names) {
        if (!queue.has(name)) {
          ctx.print(`${name} is not in the queue`);
          continue;
        }
        queue.remove(name);
        ctx.print(`Removed ${name} from queue`);
      }
      return 0;
    }

    case "clear":
      queue.clear();
      ctx.print("Queue cleared");
      return 0;

    case "install": {
      if (queue.size === 0) {
        throw new DastoreError("Queue is empty");
      }
      const question = `Install ${queue.size} queued package${queue.size === 1 ? "" : "s"}?`;
      if (!parsed.yes && !(await ctx.confirm(question))) {
        ctx.print("Queue install cancelled");
        return 0;
      }
      ctx.print("Installing Queue");
      const result = await installQueue(queue, transactionOptions(ctx, parsed.verbose));
      return reportResult(ctx, result);
    }

    default:
      throw new DastoreError(`Unknown queue action: ${action}`);
  }
}

/**
 * Runs one CLI command
 * @returns The process exit code
 */
export async function dispatch(ctx: CommandContext, parsed: ParsedArgs): Promise<number> {
  const { command, args } = parsed;
  log.debug(`Command: ${command ?? "(none)"}`, { args });

  try {
    switch (command) {
      case "search":
        return await searchCommand(ctx, args);
      case "info":
        return await infoCommand(ctx, args);
      case "install":
        return await runOperation(
          ctx,
          { type: "install", package: requireName(args, "dastore install <package>") },
          parsed.verbose
        );
      case "remove":
      case "uninstall":
        return await runOperation(
          ctx,
          { type: "uninstall", package: requireName(args, "dastore remove <package>") },
          parsed.verbose
        );
      case "update":
        return await runOperation(
          ctx,
          { type: "update", package: requireName(args, "dastore update <package>") },
          parsed.verbose
        );
      case "upgrade":
        return await upgradeCommand(ctx, parsed);
      case "queue":
        return await queueCommand(ctx, parsed);
      case "setup":
        return await ctx.setup();
      default:
        throw new DastoreError(`Unknown command: ${command ?? ""}. Run 'dastore --help' for usage.`);
    }
  } catch (error) {
    log.debug("Command failed", { command, error });
    ctx.printError(`Error: ${errorMessage(error)}`);
    return error instanceof DastoreError ? error.exitCode : 1;
  }
}
