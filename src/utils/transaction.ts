import path from "path";
import { DastoreError, errorMessage } from "./errors.js";
import { logTransaction } from "./fileLogger.js";
import { createSubLogger } from "./logger.js";
import { assertPackageName } from "./pacman.js";
import type { PackageQueue } from "./queue.js";
import { withPrefix, type CommandRunner } from "./system.js";

const log = createSubLogger("transaction");

export type OperationType = "install" | "uninstall" | "update" | "system_update" | "queue_install";

export type OperationRequest =
  | { type: "install" | "uninstall" | "update"; package: string }
  | { type: "system_update" }
  | { type: "queue_install"; packages: string[] };

export type TransactionStatus = "succeeded" | "failed" | "cancelled";

export interface TransactionResult {
  status: TransactionStatus;
  exitCode: number | null;
  /** Everything shown in the details log, command line included */
  log: string;
  logFile: string | null;
}

export interface ProgressUpdate {
  fraction: number;
  status: string;
}

export interface TransactionOptions {
  runner: CommandRunner;
  /** pkexec, sudo, or empty to run pacman directly */
  elevateCommand: string;
  /** Where transaction logs go; omit to skip file logging */
  logsDir?: string;
  onProgress?: (update: ProgressUpdate) => void;
  onOutput?: (text: string) => void;
  signal?: AbortSignal;
}

export function operationTitle(request: OperationRequest): string {
  switch (request.type) {
    case "install":
      return `Installing ${request.package}`;
    case "uninstall":
      return `Uninstalling ${request.package}`;
    case "update":
      return `Updating ${request.package}`;
    case "system_update":
      return "System Update";
    case "queue_install":
      return "Installing Queue";
  }
}

/**
 * The pacman invocation for an operation, without the elevation prefix
 */
export function pacmanArgs(request: OperationRequest): string[] {
  switch (request.type) {
    case "install":
    case "update":
      return ["-S", "--noconfirm", "--", assertPackageName(request.package)];
    case "uninstall":
      return ["-R", "--noconfirm", "--", assertPackageName(request.package)];
    case "system_update":
      return ["-Syu", "--noconfirm"];
    case "queue_install":
      if (request.packages.length === 0) {
        throw new DastoreError("The install queue is empty");
      }
      return ["-S", "--noconfirm", "--", ...request.packages.map(assertPackageName)];
  }
}

export function buildCommand(request: OperationRequest, elevateCommand: string): string[] {
  const [command, args] = withPrefix(elevateCommand, "pacman", pacmanArgs(request));
  return [command, ...args];
}

const PROGRESS_PATTERN = /\((\d+)%\)/;

/**
 * Maps a pacman output line onto overall progress, when it carries a percentage
 */
export function parseProgress(line: string): ProgressUpdate | null {
  const match = PROGRESS_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const percent = Number(match[1]) / 100;
  const lower = line.toLowerCase();
  if (lower.includes("downloading")) {
    return { fraction: 0.1 + percent * 0.3, status: "Downloading..." };
  }
  if (lower.includes("installing")) {
    return { fraction: 0.4 + percent * 0.5, status: "Installing..." };
  }
  return null;
}

/**
 * Runs one package operation to completion, answering pacman's prompts
 */
export async function executeOperation(
  request: OperationRequest,
  options: TransactionOptions
): Promise<TransactionResult> {
  const { runner, onProgress, onOutput, signal } = options;
  let output = "";

  const append = (text: string): void => {
    output += text;
    onOutput?.(text);
  };
  const progress = (fraction: number, status: string): void => {
    onProgress?.({ fraction, status });
  };

  const finish = (status: TransactionStatus, exitCode: number | null): TransactionResult => {
    const logFile = options.logsDir ? logTransaction(options.logsDir, request.type, output) : null;
    log.info(`${operationTitle(request)}: ${status}`, { exitCode, logFile });
    return { status, exitCode, log: output, logFile };
  };

  // Invalid names throw here, before anything runs
  const [command, ...args] = buildCommand(request, options.elevateCommand);
  progress(0.05, "Starting...");
  append(`Running: ${[command, ...args].join(" ")}\n\n`);

  if (signal?.aborted) {
    progress(1.0, "Cancelled");
    return finish("cancelled", null);
  }

  try {
    const result = await runner.run(command, args, {
      capture: true,
      env: { LC_ALL: "C" },
      input: "Y\n",
      signal,
      onLine: (line) => {
        append(line);
        const update = parseProgress(line);
        if (update) {
          progress(update.fraction, update.status);
        }
        if (line.toLowerCase().includes(":: proceed")) {
          return "Y\n";
        }
      },
    });

    if (result.aborted || signal?.aborted) {
      progress(1.0, "Cancelled");
      return finish("cancelled", null);
    }

    if (result.exitCode === 0) {
      progress(1.0, "✓ Completed successfully!");
      append("\n✓ Operation completed successfully!\n");
      return finish("succeeded", 0);
    }

    progress(1.0, "✗ Operation failed");
    append("\n✗ Operation failed\n");
    return finish("failed", result.exitCode);
  } catch (error) {
    const message = errorMessage(error);
    progress(1.0, `✗ Error: ${message}`);
    append(`\n✗ Error: ${message}\n`);
    return finish("failed", null);
  }
}

/**
 * Installs every queued package in one transaction and empties the queue on success
 */
export async function installQueue(
  queue: PackageQueue,
  options: TransactionOptions
): Promise<TransactionResult> {
  const packages = queue.packages.map((p) => p.name);
  const result = await executeOperation({ type: "queue_install", packages }, options);
  if (result.status === "succeeded") {
    queue.clear();
  }
  return result;
}

export function transactionLogsDir(stateDir: string): string {
  return path.join(stateDir, "logs");
}
