/**
 * Error types shared by the installer, the package core and both surfaces.
 * Every error carries the process exit code the CLI should leave with.
 */

export class DastoreError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DastoreError";
    this.exitCode = exitCode;
  }
}

export class NotArchLinuxError extends DastoreError {
  constructor() {
    super("This script is intended for Arch Linux based distributions only.", 1);
    this.name = "NotArchLinuxError";
  }
}

export class CommandError extends DastoreError {
  readonly command: string;
  readonly args: string[];
  readonly stderr: string;

  constructor(
    command: string,
    args: string[],
    exitCode: number,
    stderr = "",
    options?: { cause?: unknown }
  ) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
    super(
      `Command failed with exit code ${exitCode}: ${[command, ...args].join(" ")}${detail}`,
      exitCode > 0 ? exitCode : 1,
      options
    );
    this.name = "CommandError";
    this.command = command;
    this.args = args;
    this.stderr = stderr;
  }
}

export class PackageNotFoundError extends DastoreError {
  readonly packageName: string;

  constructor(packageName: string) {
    super(`Package not found: ${packageName}`, 1);
    this.name = "PackageNotFoundError";
    this.packageName = packageName;
  }
}

export class ConfigError extends DastoreError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`, 1);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
