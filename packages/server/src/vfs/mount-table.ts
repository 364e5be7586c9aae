/**
 * Mount table - which filesystem provider serves which path
 *
 * Providers are stacked: the most recently registered provider at the
 * longest matching mount path wins, and unregistering it uncovers whatever
 * was mounted before.
 */

import { resolve } from "node:path";
import type { Logger } from "pino";
import type { FilesystemProvider } from "@fsfault/shared";

export interface Mount {
  name: string;
  path: string;
  provider: FilesystemProvider;
}

export class MountTable {
  private mounts: Mount[] = [];

  /**
   * @param fallback provider for paths no mount covers (the real filesystem)
   */
  constructor(
    private readonly fallback: FilesystemProvider,
    private readonly log?: Logger
  ) {}

  register(name: string, mountPath: string, provider: FilesystemProvider): Mount {
    const path = this.normalizePath(mountPath);
    if (this.mounts.some((m) => m.name === name && m.path === path)) {
      throw new Error(`Provider '${name}' already mounted at ${path}`);
    }

    const mount: Mount = { name, path, provider };
    this.mounts.push(mount);
    this.log?.info({ name, path }, "Filesystem provider mounted");
    return mount;
  }

  /**
   * @returns false when no such provider was mounted
   */
  unregister(mountPath: string, name: string): boolean {
    const path = this.normalizePath(mountPath);
    const index = this.mounts.findIndex(
      (m) => m.name === name && m.path === path
    );
    if (index < 0) {
      return false;
    }

    this.mounts.splice(index, 1);
    this.log?.info({ name, path }, "Filesystem provider unmounted");
    return true;
  }

  /**
   * Provider serving the given path
   */
  resolve(path: string): FilesystemProvider {
    const normalized = this.normalizePath(path);

    let best: Mount | undefined;
    for (const mount of this.mounts) {
      if (!this.covers(mount.path, normalized)) continue;
      // Later registrations shadow earlier ones at the same depth
      if (!best || mount.path.length >= best.path.length) {
        best = mount;
      }
    }

    return best?.provider ?? this.fallback;
  }

  list(): readonly Mount[] {
    return [...this.mounts];
  }

  private normalizePath(path: string): string {
    return resolve("/", path);
  }

  private covers(mountPath: string, path: string): boolean {
    return (
      mountPath === "/" ||
      path === mountPath ||
      path.startsWith(mountPath + "/")
    );
  }
}
