#!/usr/bin/env node

import fs from "fs";
import path from "path";
import { loadConfig, rootDir, type DastoreConfig } from "./utils/dotenv-config.js";
import { renderDesktopEntry } from "./utils/desktop-entry.js";
import { DastoreError, NotArchLinuxError, errorMessage } from "./utils/errors.js";
import { autoTarget, type InstallTarget } from "./utils/install-target.js";
import { createSubLogger } from "./utils/logger.js";
import {
  isMainModule,
  runOrThrow,
  systemRunner,
  withPrefix,
  type CommandRunner,
} from "./utils/system.js";

const log = createSubLogger("install");

export const ARCH_MARKER_FILE = "/etc/arch-release";
export const RUNTIME_DEPENDENCIES = ["nodejs", "polkit"];
export const BUILD_DEPENDENCIES = ["base-devel", "git"];
export const APP_FILES = ["package.json", "dist", "node_modules"];

export interface InstallerOptions {
  /** Present only on Arch Linux and derivatives */
  markerFile: string;
  /** Package root the application files are copied from */
  sourceDir: string;
  /** Paths relative to sourceDir */
  appFiles: string[];
  iconFile: string;
  installDir: string;
  /** Relative to installDir */
  entryPoint: string;
  desktopEntryPath: string;
  binLink: string;
  dependencies: string[];
  aurHelper: string;
  aurHelperRepo: string;
  /** The AUR helper is cloned and built here */
  buildRoot: string;
  sudoCommand: string;
  runner: CommandRunner;
  /** Fixed target for every file change; chosen per destination when unset */
  target?: InstallTarget;
  report: (message: string) => void;
}

export function defaultInstallerOptions(
  config: DastoreConfig,
  overrides: Partial<InstallerOptions> = {}
): InstallerOptions {
  const aurHelper = overrides.aurHelper ?? config.aurHelper;
  return {
    markerFile: ARCH_MARKER_FILE,
    sourceDir: rootDir,
    appFiles: APP_FILES,
    iconFile: path.join("assets", "dastore.svg"),
    installDir: config.installDir,
    entryPoint: path.join("dist", "cli.js"),
    desktopEntryPath: "/usr/share/applications/dastore.desktop",
    binLink: "/usr/local/bin/dastore",
    dependencies: RUNTIME_DEPENDENCIES,
    aurHelper,
    aurHelperRepo: `https://aur.archlinux.org/${aurHelper}.git`,
    buildRoot: process.cwd(),
    sudoCommand: config.sudoCommand,
    runner: systemRunner,
    report: (message) => console.log(`==> ${message}`),
    ...overrides,
  };
}

export interface InstallContext {
  options: InstallerOptions;
  targetFor: (dest: string) => Promise<InstallTarget>;
  sudo: (command: string, args: string[], cwd?: string) => Promise<void>;
  run: (command: string, args: string[], cwd?: string) => Promise<void>;
}

export interface InstallStep {
  name: string;
  run(ctx: InstallContext): Promise<void>;
}

export function installedEntryPoint(options: InstallerOptions): string {
  return path.join(options.installDir, options.entryPoint);
}

export function installedIcon(options: InstallerOptions): string {
  return path.join(options.installDir, path.basename(options.iconFile));
}

const checkArch: InstallStep = {
  name: "checkArch",
  async run({ options }) {
    options.report("Checking for Arch Linux...");
    if (!fs.existsSync(options.markerFile)) {
      throw new NotArchLinuxError();
    }
    options.report("Arch Linux detected.");
  },
};

const installDependencies: InstallStep = {
  name: "installDependencies",
  async run({ options, sudo }) {
    options.report("Installing dependencies...");
    await sudo("pacman", ["-S", "--needed", "--noconfirm", ...options.dependencies]);
  },
};

const ensureAurHelper: InstallStep = {
  name: "ensureAurHelper",
  async run({ options, sudo, run }) {
    const helper = options.aurHelper;
    if (!(await options.runner.exists(helper))) {
      options.report(`${helper} not found. Installing ${helper}...`);
      await sudo("pacman", ["-S", "--needed", "--noconfirm", ...BUILD_DEPENDENCIES]);

      const buildDir = path.join(options.buildRoot, helper);
      await run("git", ["clone", options.aurHelperRepo], options.buildRoot);
      await run("makepkg", ["-si", "--noconfirm", "--asdeps"], buildDir);
      await fs.promises.rm(buildDir, { recursive: true, force: true });
      log.debug(`Removed build directory ${buildDir}`);
    }
    options.report("Dependencies installed.");
  },
};

const placeArtifacts: InstallStep = {
  name: "placeArtifacts",
  async run({ options, targetFor }) {
    options.report(`Installing Dastore to ${options.installDir}...`);

    const sources = [...options.appFiles, options.iconFile].map((file) =>
      path.join(options.sourceDir, file)
    );
    for (const source of sources) {
      if (!fs.existsSync(source)) {
        throw new DastoreError(`Missing application file: ${source}`);
      }
    }

    const target = await targetFor(options.installDir);
    await target.mkdir(options.installDir);
    for (const source of sources) {
      await target.copyInto(source, options.installDir);
    }
    await target.makeExecutable(installedEntryPoint(options));
  },
};

const writeDesktopEntry: InstallStep = {
  name: "writeDesktopEntry",
  async run({ options, targetFor }) {
    options.report("Creating desktop entry...");
    const content = renderDesktopEntry({
      name: "Dastore",
      comment: "A package manager for Arch Linux",
      exec: installedEntryPoint(options),
      icon: installedIcon(options),
      categories: ["System", "PackageManager"],
      terminal: true,
    });
    const target = await targetFor(options.desktopEntryPath);
    await target.writeFile(options.desktopEntryPath, content);
  },
};

const linkExecutable: InstallStep = {
  name: "linkExecutable",
  async run({ options, targetFor }) {
    options.report(`Creating executable link in ${path.dirname(options.binLink)}...`);
    const target = await targetFor(options.binLink);
    await target.symlink(installedEntryPoint(options), options.binLink);
  },
};

export const INSTALL_STEPS: InstallStep[] = [
  checkArch,
  installDependencies,
  ensureAurHelper,
  placeArtifacts,
  writeDesktopEntry,
  linkExecutable,
];

/**
 * Runs every install step in order. The first failure stops the run and
 * propagates; completed steps are not undone.
 */
export async function runInstaller(options: InstallerOptions): Promise<void> {
  const chooseTarget = autoTarget(options.runner, options.sudoCommand);
  const fixedTarget = options.target;
  const ctx: InstallContext = {
    options,
    targetFor: fixedTarget ? async () => fixedTarget : chooseTarget,
    sudo: async (command, args, cwd) => {
      const [head, rest] = withPrefix(options.sudoCommand, command, args);
      await runOrThrow(options.runner, head, rest, { cwd });
    },
    run: async (command, args, cwd) => {
      await runOrThrow(options.runner, command, args, { cwd });
    },
  };

  options.report("Dastore Installer");
  for (const step of INSTALL_STEPS) {
    log.debug(`Step: ${step.name}`);
    await step.run(ctx);
  }
  options.report(
    "Installation complete! You can now run 'dastore' from your terminal or find it in your app menu."
  );
}

/**
 * Installer entry point
 * @returns The process exit code
 */
export async function main(overrides: Partial<InstallerOptions> = {}): Promise<number> {
  try {
    const options = defaultInstallerOptions(loadConfig(), overrides);
    await runInstaller(options);
    return 0;
  } catch (error) {
    log.debug("Installation failed", { error });
    console.error(errorMessage(error));
    return error instanceof DastoreError ? error.exitCode : 1;
  }
}

// Only run if this is the main module
if (isMainModule(import.meta.url)) {
  main().then((code) => {
    process.exitCode = code;
  });
}
