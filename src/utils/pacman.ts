import { z } from "zod";
import { CommandError, DastoreError, PackageNotFoundError } from "./errors.js";
import { createSubLogger } from "./logger.js";
import type { CommandRunner } from "./system.js";

const log = createSubLogger("pacman");

export const MIN_QUERY_LENGTH = 2;

// Lowercase alphanumerics and @._+-, never starting with a hyphen or a dot
export const PACKAGE_NAME_PATTERN = /^[a-z0-9@_+][a-z0-9@._+-]*$/;

export const PackageNameSchema = z.string().regex(PACKAGE_NAME_PATTERN, "Invalid package name");

/**
 * Rejects anything pacman could read as an option instead of a target
 */
export function assertPackageName(name: string): string {
  if (!PACKAGE_NAME_PATTERN.test(name)) {
    throw new DastoreError(`Invalid package name: ${name}`);
  }
  return name;
}

export const PackageInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().default(""),
  description: z.string().default(""),
  repo: z.string().default(""),
  size: z.string().default(""),
  installedSize: z.string().default(""),
  depends: z.array(z.string()).default([]),
  url: z.string().default(""),
  licenses: z.array(z.string()).default([]),
  groups: z.array(z.string()).default([]),
  installed: z.boolean().default(false),
  updateAvailable: z.boolean().default(false),
  relevanceScore: z.number().int().default(0),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

/**
 * Builds a PackageInfo with every field not given left empty
 */
export function createPackageInfo(fields: Partial<PackageInfo> & { name: string }): PackageInfo {
  return PackageInfoSchema.parse(fields);
}

// Matches "[installed]" and "[installed: 1.2-1]"
const INSTALLED_MARKER = /\[installed(?::\s*([^\]]+))?\]/;

/**
 * Parses `pacman -Ss` output into packages, in output order
 */
export function parseSearchOutput(output: string): PackageInfo[] {
  const packages: PackageInfo[] = [];
  const lines = output.trim().split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line || line.startsWith(" ")) {
      continue;
    }

    const slash = line.indexOf("/");
    if (slash === -1) {
      continue;
    }

    const repo = line.slice(0, slash);
    const [name, version] = line.slice(slash + 1).split(/\s+/);
    if (!name || !version) {
      continue;
    }

    const marker = INSTALLED_MARKER.exec(line);
    const next = lines[i + 1];
    const description = next !== undefined && next.startsWith("    ") ? next.trim() : "";

    packages.push(
      createPackageInfo({
        name,
        version,
        description,
        repo,
        installed: marker !== null,
        // pacman prints the local version only when it differs from the sync one
        updateAvailable: marker?.[1] !== undefined,
      })
    );
  }

  return packages;
}

/**
 * Scores how well a package name matches a query
 */
export function calculateRelevance(pkg: PackageInfo, query: string): number {
  let score = 0;
  const queryLower = query.toLowerCase();
  const nameLower = pkg.name.toLowerCase();

  if (nameLower === queryLower) {
    score += 1000;
  } else if (nameLower.startsWith(queryLower)) {
    score += 800;
  } else if (nameLower.includes(queryLower)) {
    score += 400;
  }

  if (pkg.installed) {
    score += 50;
  }

  return score;
}

/**
 * Scores and orders packages by relevance, highest first. Ties keep their order.
 */
export function rankPackages(packages: PackageInfo[], query: string): PackageInfo[] {
  return packages
    .map((pkg) => ({ ...pkg, relevanceScore: calculateRelevance(pkg, query) }))
    .sort((a, b) => b.relevanceScore - a.relevanceScore);
}

type ListField = "depends" | "licenses" | "groups";
type TextField = "repo" | "version" | "description" | "url" | "size" | "installedSize";

const TEXT_FIELDS: Record<string, TextField> = {
  Repository: "repo",
  Version: "version",
  Description: "description",
  URL: "url",
  "Download Size": "size",
  "Installed Size": "installedSize",
};

const LIST_FIELDS: Record<string, ListField> = {
  Licenses: "licenses",
  Groups: "groups",
  "Depends On": "depends",
};

function splitList(value: string): string[] {
  const trimmed = value.trim();
  if (!trimmed || trimmed === "None") {
    return [];
  }
  return trimmed.split(/\s{2,}/).filter((item) => item);
}

/**
 * Merges `pacman -Si` / `pacman -Qi` output into a package
 */
export function parseInfoOutput(output: string, base: PackageInfo): PackageInfo {
  const details: PackageInfo = {
    ...base,
    depends: [...base.depends],
    licenses: [...base.licenses],
    groups: [...base.groups],
  };
  let lastList: ListField | null = null;

  for (const line of output.split("\n")) {
    // Wrapped values are indented under the previous key
    if (/^\s/.test(line)) {
      if (lastList && line.trim()) {
        details[lastList].push(...splitList(line));
      }
      continue;
    }

    const colon = line.indexOf(":");
    if (colon === -1) {
      lastList = null;
      continue;
    }

    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();

    const textField = TEXT_FIELDS[key];
    const listField = LIST_FIELDS[key];
    if (textField) {
      details[textField] = value;
      lastList = null;
    } else if (listField) {
      details[listField] = splitList(value);
      lastList = listField;
    } else {
      lastList = null;
    }
  }

  return details;
}

export interface PackageManagerOptions {
  runner: CommandRunner;
  searchLimit?: number;
  timeoutMs?: number;
}

/**
 * Read-only queries against the pacman databases
 */
export class PackageManager {
  private readonly runner: CommandRunner;
  private readonly searchLimit: number;
  private readonly timeoutMs: number;

  constructor(options: PackageManagerOptions) {
    this.runner = options.runner;
    this.searchLimit = options.searchLimit ?? 50;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  private query(args: string[]) {
    return this.runner.run("pacman", args, {
      capture: true,
      timeoutMs: this.timeoutMs,
      env: { LC_ALL: "C" },
    });
  }

  async search(query: string): Promise<PackageInfo[]> {
    const trimmed = query.trim();
    if (trimmed.length < MIN_QUERY_LENGTH) {
      return [];
    }

    const result = await this.query(["-Ss", "--", trimmed]);
    // pacman -Ss exits 1 when nothing matches
    if (result.exitCode === 1 && !result.stdout.trim()) {
      return [];
    }
    if (result.exitCode !== 0) {
      throw new CommandError("pacman", ["-Ss", "--", trimmed], result.exitCode, result.stderr);
    }

    const ranked = rankPackages(parseSearchOutput(result.stdout), trimmed);
    log.debug(`Search for '${trimmed}' matched ${ranked.length} packages`);
    return ranked.slice(0, this.searchLimit);
  }

  async isInstalled(name: string): Promise<boolean> {
    const result = await this.query(["-Q", "--", assertPackageName(name)]);
    return result.exitCode === 0;
  }

  /**
   * Full details for a package from the sync database, or the local one when
   * the package is not in any repository
   */
  async details(pkg: PackageInfo | string): Promise<PackageInfo> {
    const base = typeof pkg === "string" ? createPackageInfo({ name: pkg }) : pkg;
    assertPackageName(base.name);

    let result = await this.query(["-Si", "--", base.name]);
    if (result.exitCode !== 0) {
      log.debug(`${base.name} not in sync databases, trying local database`);
      result = await this.query(["-Qi", "--", base.name]);
    }
    if (result.exitCode !== 0) {
      throw new PackageNotFoundError(base.name);
    }

    const details = parseInfoOutput(result.stdout, base);
    details.installed = await this.isInstalled(base.name);
    return details;
  }
}
