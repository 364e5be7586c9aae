/**
 * Fault engine - owns one configuration generation and installs the
 * faulting provider into sessions
 *
 * Faults are only injected into sessions, never into the process that
 * loads the configuration.
 */

import { nanoid } from "nanoid";
import type { Logger } from "pino";
import {
  DIRECTIVES,
  FAULT_MOUNT,
  type Directive,
  type FaultBinding,
  type FilesystemProvider,
} from "@fsfault/shared";
import { FaultConfigError } from "../errors/config-error.js";
import { dumpTable, FaultTable, type FaultTableView } from "../faults/table.js";
import { applyFaultInjectArgs, parseEngineFlag } from "../faults/validator.js";
import { FaultingFilesystemProvider } from "../vfs/faulting-provider.js";
import type { MountTable } from "../vfs/mount-table.js";
import { NodeFilesystemProvider, type SessionState } from "../vfs/node-provider.js";

export interface FaultEngineOptions {
  logger: Logger;
}

export interface OpenSessionOptions {
  /** The session's mount table; the faulting provider is installed here */
  mounts: MountTable;
  sessionId?: string;
  /** Defaults to the state of the real provider mounted at the root */
  state?: SessionState;
}

export interface FaultSession {
  readonly id: string;
  /** FaultEngine setting, resolved when the session opened */
  readonly engineEnabled: boolean;
  /** Whether a faulting provider was installed for this session */
  readonly faulting: boolean;
  /** Bindings this session was opened with */
  readonly table: FaultTableView;
  /** Provider serving the filesystem root for this session */
  readonly provider: FilesystemProvider;
  /** Session root, moved by a successful chroot */
  readonly state: SessionState;
  close(): void;
}

interface Installation {
  mounts: MountTable;
  name: string;
  path: string;
}

export class FaultEngine {
  private table = new FaultTable();
  private engineFlag: boolean | undefined;
  private readonly installations = new Set<Installation>();
  private readonly log: Logger;

  constructor(options: FaultEngineOptions) {
    this.log = options.logger;
  }

  /**
   * Apply directives to the current generation. The first invalid
   * directive aborts with a FaultConfigError; directives (and operations)
   * applied before it stay applied.
   */
  configure(directives: readonly Directive[]): void {
    for (const directive of directives) {
      try {
        this.applyDirective(directive);
      } catch (err) {
        if (err instanceof FaultConfigError) {
          throw err.at(directive);
        }
        throw err;
      }
    }
  }

  /**
   * Start a new generation from scratch
   */
  reload(directives: readonly Directive[]): void {
    this.restart();
    this.configure(directives);
  }

  /**
   * Discard the current generation. Sessions already open keep the
   * bindings they were opened with.
   */
  restart(): void {
    this.table = new FaultTable();
    this.engineFlag = undefined;
    this.log.info("Fault configuration reset");
  }

  /**
   * FaultEngine setting of the current generation (off unless configured)
   */
  isEnabled(): boolean {
    return this.engineFlag === true;
  }

  count(): number {
    return this.table.count();
  }

  bindings(): FaultBinding[] {
    return this.table.entries();
  }

  dump(): void {
    dumpTable(this.table, this.log);
  }

  /**
   * Resolve the engine state for a new session and, when it is on and
   * faults are configured, mount the faulting provider at the root.
   */
  openSession(options: OpenSessionOptions): FaultSession {
    const id = options.sessionId ?? nanoid();
    const log = this.log.child({ sessionId: id });
    const engineEnabled = this.isEnabled();
    const snapshot = this.table.snapshot();
    const { mounts } = options;
    const underlying = mounts.resolve(FAULT_MOUNT.PATH);
    const state =
      options.state ??
      (underlying instanceof NodeFilesystemProvider ? underlying.state : { root: "/" });

    let installation: Installation | undefined;
    const faultCount = snapshot.count();
    if (engineEnabled && faultCount > 0) {
      log.debug(
        { faultCount },
        `filesystem fault injections (${faultCount}) configured, registering custom FS`
      );
      dumpTable(snapshot, log);

      const provider = new FaultingFilesystemProvider({
        real: underlying,
        table: snapshot,
        logger: log,
      });
      mounts.register(provider.name, FAULT_MOUNT.PATH, provider);

      installation = { mounts, name: provider.name, path: FAULT_MOUNT.PATH };
      this.installations.add(installation);
    }

    return {
      id,
      engineEnabled,
      faulting: installation !== undefined,
      table: snapshot,
      provider: mounts.resolve(FAULT_MOUNT.PATH),
      state,
      close: () => {
        if (installation) {
          this.uninstall(installation);
          installation = undefined;
        }
      },
    };
  }

  /**
   * Tear down: unmount every installed provider before dropping the table
   */
  unload(): void {
    for (const installation of [...this.installations]) {
      this.uninstall(installation);
    }

    this.table = new FaultTable();
    this.engineFlag = undefined;
    this.log.info("Fault engine unloaded");
  }

  private uninstall(installation: Installation): void {
    installation.mounts.unregister(installation.path, installation.name);
    this.installations.delete(installation);
  }

  private applyDirective(directive: Directive): void {
    const name = directive.name.toLowerCase();

    if (name === DIRECTIVES.ENGINE.toLowerCase()) {
      this.engineFlag = parseEngineFlag(directive.args);
      return;
    }

    if (name === DIRECTIVES.INJECT.toLowerCase()) {
      const bound = applyFaultInjectArgs(this.table, directive.args);
      this.log.debug(
        { bindings: bound.map((b) => b.operation), line: directive.line },
        "Fault injection configured"
      );
      return;
    }

    throw new FaultConfigError(
      "UnknownDirective",
      `unknown directive: ${directive.name}`
    );
  }
}
