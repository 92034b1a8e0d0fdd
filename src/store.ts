// CHANGE: Run-scoped content store for mirrored plugin scripts.
// WHY: The directory is wiped at the start of each run; files never outlive the run's manifests.

import fs from "fs-extra";
import path from "path";
import { debug, info } from "./logger.js";

/**
 * Directory holding one text file per successfully downloaded plugin.
 */
export class ContentStore {
  constructor(readonly directory: string) {}

  /**
   * Remove the directory with its contents and create it again.
   *
   * @throws Error when the directory cannot be removed or created.
   */
  async reset(): Promise<void> {
    if (await fs.pathExists(this.directory)) {
      await fs.remove(this.directory);
      info(`Removed directory ${this.directory}`);
    }
    await fs.ensureDir(this.directory);
    info(`Created directory ${this.directory}`);
  }

  /**
   * Write a payload as UTF-8 text.
   *
   * @returns Path of the written file.
   */
  async write(filename: string, content: string): Promise<string> {
    const target = path.join(this.directory, filename);
    await fs.outputFile(target, content, { encoding: "utf8" });
    debug(`Stored ${Buffer.byteLength(content, "utf8")} bytes at ${target}`);
    return target;
  }

  /**
   * List stored filenames, sorted.
   */
  async list(): Promise<string[]> {
    if (!(await fs.pathExists(this.directory))) {
      return [];
    }
    const entries = await fs.readdir(this.directory);
    return entries.sort();
  }
}
