import fs from "fs";
import os from "os";
import path from "path";
import { createSubLogger } from "./logger.js";
import { runOrThrow, withPrefix, type CommandRunner } from "./system.js";

const log = createSubLogger("install-target");

/**
 * Filesystem changes the installer makes under system directories
 */
export interface InstallTarget {
  mkdir(dir: string): Promise<void>;
  /** Copies a file or directory into `destDir`, keeping its base name */
  copyInto(source: string, destDir: string): Promise<void>;
  writeFile(dest: string, content: string): Promise<void>;
  makeExecutable(file: string): Promise<void>;
  /** Creates `linkPath` pointing at `target`, replacing whatever was there */
  symlink(target: string, linkPath: string): Promise<void>;
}

/**
 * Changes files directly, for destinations this process can write to
 */
export const directTarget: InstallTarget = {
  async mkdir(dir) {
    await fs.promises.mkdir(dir, { recursive: true });
  },

  async copyInto(source, destDir) {
    await fs.promises.cp(source, path.join(destDir, path.basename(source)), {
      recursive: true,
      force: true,
      // node_modules/.bin holds relative links that must stay relative
      verbatimSymlinks: true,
    });
  },

  async writeFile(dest, content) {
    await fs.promises.mkdir(path.dirname(dest), { recursive: true });
    await fs.promises.writeFile(dest, content, { mode: 0o644 });
  },

  async makeExecutable(file) {
    await fs.promises.chmod(file, 0o755);
  },

  async symlink(target, linkPath) {
    await fs.promises.mkdir(path.dirname(linkPath), { recursive: true });
    await fs.promises.rm(linkPath, { force: true });
    await fs.promises.symlink(target, linkPath);
  },
};

/**
 * Changes files through an elevation command such as sudo
 */
export function elevatedTarget(runner: CommandRunner, sudoCommand: string): InstallTarget {
  const run = (command: string, args: string[]) => {
    const [head, rest] = withPrefix(sudoCommand, command, args);
    return runOrThrow(runner, head, rest);
  };

  return {
    async mkdir(dir) {
      await run("mkdir", ["-p", dir]);
    },

    async copyInto(source, destDir) {
      await run("cp", ["-r", source, `${destDir}/`]);
    },

    async writeFile(dest, content) {
      const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "dastore-"));
      const tmpFile = path.join(tmpDir, path.basename(dest));
      try {
        await fs.promises.writeFile(tmpFile, content);
        await run("install", ["-D", "-m", "644", tmpFile, dest]);
      } finally {
        await fs.promises.rm(tmpDir, { recursive: true, force: true });
      }
    },

    async makeExecutable(file) {
      await run("chmod", ["755", file]);
    },

    async symlink(target, linkPath) {
      await run("mkdir", ["-p", path.dirname(linkPath)]);
      await run("ln", ["-sf", target, linkPath]);
    },
  };
}

/**
 * Whether this process may create or replace `dest`, judged by the nearest
 * existing path at or above it
 */
export async function canWrite(dest: string): Promise<boolean> {
  let current = path.resolve(dest);
  for (;;) {
    try {
      await fs.promises.access(current, fs.constants.W_OK);
      return true;
    } catch (error) {
      if (!isMissing(error)) {
        log.debug(`No write access at ${current}`);
        return false;
      }
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return false;
    }
    current = parent;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Picks direct changes where possible, elevated ones elsewhere
 */
export function autoTarget(runner: CommandRunner, sudoCommand: string): (dest: string) => Promise<InstallTarget> {
  const elevated = elevatedTarget(runner, sudoCommand);
  return async (dest) => ((await canWrite(dest)) ? directTarget : elevated);
}
