import * as fs from "fs";
import * as path from "path";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("locator");

export interface FileLocator {
  locate(fileName: string): Promise<string | undefined>;
}

/**
 * Looks a file up by name under a list of folders. Folders are searched in
 * the order given and each tree is walked in sorted order, so the first
 * match is stable between runs.
 */
export class FolderFileLocator implements FileLocator {
  constructor(private readonly folders: readonly string[]) {}

  async locate(fileName: string): Promise<string | undefined> {
    const wanted = path.basename(fileName);
    for (const folder of this.folders) {
      const found = await this.search(folder, wanted);
      if (found) {
        log.info(`Located ${wanted} at ${found}`);
        return found;
      }
    }
    log.debug(`No copy of ${wanted} under ${this.folders.length} scan folders`);
    return undefined;
  }

  private async search(dir: string, wanted: string): Promise<string | undefined> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      log.debug(`Cannot read ${dir}: ${errorMessage(error)}`);
      return undefined;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.isFile() && entry.name === wanted) return path.join(dir, entry.name);
    }
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith(".")) continue;
      const found = await this.search(path.join(dir, entry.name), wanted);
      if (found) return found;
    }
    return undefined;
  }
}
