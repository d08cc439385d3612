import fs from "fs";
import path from "path";
import { z } from "zod";
import { DastoreError, errorMessage } from "./errors.js";
import { createSubLogger } from "./logger.js";
import { PackageInfoSchema, type PackageInfo } from "./pacman.js";

const log = createSubLogger("queue");

const QueueFileSchema = z.array(PackageInfoSchema);

export type QueueListener = (packages: PackageInfo[]) => void;

/**
 * Packages waiting to be installed together, one entry per package name
 */
export class PackageQueue {
  private items: PackageInfo[];
  private listeners: QueueListener[] = [];

  constructor(packages: PackageInfo[] = []) {
    this.items = [];
    for (const pkg of packages) {
      if (!this.has(pkg.name)) {
        this.items.push(pkg);
      }
    }
  }

  has(name: string): boolean {
    return this.items.some((p) => p.name === name);
  }

  /**
   * @returns false when a package with the same name is already queued
   */
  add(pkg: PackageInfo): boolean {
    if (this.has(pkg.name)) {
      return false;
    }
    this.items.push(pkg);
    this.notify();
    return true;
  }

  remove(name: string): void {
    this.items = this.items.filter((p) => p.name !== name);
    this.notify();
  }

  clear(): void {
    this.items = [];
    this.notify();
  }

  onChange(listener: QueueListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  get packages(): PackageInfo[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  private notify(): void {
    const snapshot = this.packages;
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }

  /**
   * Reads a queue saved by {@link PackageQueue.attach}. A missing file is an empty queue.
   */
  static load(filePath: string): PackageQueue {
    if (!fs.existsSync(filePath)) {
      return new PackageQueue();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new DastoreError(`Could not read queue file ${filePath}: ${errorMessage(error)}`, 1, {
        cause: error,
      });
    }

    const parsed = QueueFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DastoreError(`Queue file ${filePath} is not a list of packages`);
    }
    return new PackageQueue(parsed.data);
  }

  /**
   * Saves the queue to `filePath` after every change
   * @returns Function that stops saving
   */
  attach(filePath: string): () => void {
    const save = (packages: PackageInfo[]): void => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify(packages, null, 2));
      log.debug(`Saved queue with ${packages.length} packages`, { filePath });
    };
    return this.onChange(save);
  }
}

/**
 * Opens the queue kept in the state directory
 */
export function openQueue(stateDir: string): PackageQueue {
  const filePath = path.join(stateDir, "queue.json");
  const queue = PackageQueue.load(filePath);
  queue.attach(filePath);
  return queue;
}
