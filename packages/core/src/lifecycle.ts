import { mkdtemp } from "fs/promises";
import { tmpdir } from "os";
import { basename, join } from "path";
import { remove } from "fs-extra";

/**
 * Lifecycle helpers for resources that must be released on every exit path of a run: normal
 * completion, a failed step, or an interrupt signal.
 */
export type Dispose = () => void | Promise<void>;

export class Disposable {
  private disposers: Dispose[] = [];

  get pending(): number {
    return this.disposers.length;
  }

  collect(dispose: Dispose): void {
    this.disposers.push(dispose);
  }

  /**
   * Runs the collected callbacks newest-first. Callbacks are detached before they run, so a second
   * call while the first is still in flight does nothing.
   */
  async run(): Promise<void> {
    const disposers = this.disposers.reverse();
    this.disposers = [];
    let firstError: unknown;
    let failed = false;
    for (const dispose of disposers) {
      try {
        await dispose();
      } catch (error) {
        if (!failed) {
          firstError = error;
          failed = true;
        }
      }
    }
    if (failed) {
      throw firstError;
    }
  }
}

export interface ScratchAreaOptions {
  prefix?: string;
  /** Parent directory for the scratch area, the OS temp dir by default. */
  tmpRoot?: string;
}

/**
 * Private working directory for intermediate artifacts. Only file names are accepted by
 * {@link ScratchArea.resolve}, so nothing is written outside it.
 */
export class ScratchArea {
  private disposed = false;

  private constructor(readonly root: string) {}

  static async create(options: ScratchAreaOptions = {}): Promise<ScratchArea> {
    const root = await mkdtemp(join(options.tmpRoot ?? tmpdir(), options.prefix ?? "clipgif-"));
    return new ScratchArea(root);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  resolve(name: string): string {
    if (this.disposed) {
      throw new Error(`Scratch area ${this.root} has already been removed`);
    }
    if (name.length === 0 || name === "." || name === ".." || basename(name) !== name) {
      throw new Error(`Invalid scratch file name "${name}"`);
    }
    return join(this.root, name);
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await remove(this.root);
  }
}
