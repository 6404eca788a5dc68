/**
 * Launches apps by friendly name or package name, on the primary display or
 * on a virtual one.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { Logger } from "../logger.js";
import type { CommandChannel } from "../shell/channel.js";
import { executeCommand } from "../shell/exec.js";

const TAG = "AppLauncher";
const PACKAGE_NAME = /^[A-Za-z][\w]*(\.[A-Za-z_][\w]*)+$/;

export type AppCatalog = Record<string, string>;

/** Nearest directory at or above `from` holding a package.json. */
export function findPackageRoot(from: string): string {
  let dir = from;
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) throw new Error(`No package.json above ${from}`);
    dir = parent;
  }
  return dir;
}

/** data/apps.json of this package, whether running from src/ or dist/. */
export function defaultCatalogPath(): string {
  return join(findPackageRoot(dirname(fileURLToPath(import.meta.url))), "data", "apps.json");
}

/** Reads the bundled name -> package table. */
export function loadAppCatalog(path = defaultCatalogPath()): AppCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const catalog: AppCatalog = {};
  if (raw && typeof raw === "object") {
    for (const [name, pkg] of Object.entries(raw)) {
      if (typeof pkg === "string") catalog[name.toLowerCase()] = pkg;
    }
  }
  return catalog;
}

export class AppLauncher {
  private readonly catalog: AppCatalog;

  constructor(
    private readonly channel: CommandChannel,
    private readonly logger: Logger,
    catalog: AppCatalog = loadAppCatalog()
  ) {
    this.catalog = Object.fromEntries(Object.entries(catalog).map(([k, v]) => [k.toLowerCase(), v]));
  }

  /** Catalog lookup first, then anything shaped like a package name. */
  resolvePackage(app: string): string | null {
    const name = app.trim();
    if (!name) return null;
    const known = this.catalog[name.toLowerCase()];
    if (known) return known;
    return PACKAGE_NAME.test(name) ? name : null;
  }

  async launch(app: string, displayId?: number): Promise<boolean> {
    const packageName = this.resolvePackage(app);
    if (!packageName) {
      this.logger.warn(TAG, `App not found: ${app}`);
      return false;
    }

    if (displayId === undefined) {
      this.logger.info(TAG, `Launching ${packageName}`);
      const result = await executeCommand(this.channel, this.logger, TAG, { kind: "launch-package", packageName });
      return result.success;
    }

    const component = await this.resolveLauncherActivity(packageName);
    if (!component) {
      this.logger.warn(TAG, `No launcher activity for ${packageName}`);
      return false;
    }
    this.logger.info(TAG, `Launching ${component} on display ${displayId}`);
    const result = await executeCommand(this.channel, this.logger, TAG, {
      kind: "start-activity",
      component,
      displayId,
    });
    return result.success;
  }

  /** `resolve-activity --brief` prints the component on its last line. */
  private async resolveLauncherActivity(packageName: string): Promise<string | null> {
    const result = await executeCommand(this.channel, this.logger, TAG, { kind: "resolve-launcher", packageName });
    if (!result.success) return null;
    const lines = (result.output ?? "").split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
    const last = lines[lines.length - 1];
    return last && last.startsWith(`${packageName}/`) ? last : null;
  }
}
