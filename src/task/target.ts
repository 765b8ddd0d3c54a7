import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { getConfig } from "../config.js";
import { BundleError, TargetError } from "../errors.js";
import { parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import { Bundle, bundles } from "./bundle.js";
import type { Target } from "./types.js";

/** A target that is also a value record, so it can sit in task fields. */
export type TargetBundle = Bundle & Target;

export function isTargetBundle(value: unknown): value is TargetBundle {
  return value instanceof Bundle && "exists" in value && typeof value.exists === "function";
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/** Output of tasks that produce nothing. Never exists, so such tasks always run. */
export class NoTarget extends Bundle<Record<string, never>> implements Target {
  readonly kind = "no-target";

  constructor() {
    super({});
  }

  exists(): boolean {
    return false;
  }
}

export const NO_TARGET = new NoTarget();

/**
 * In-process slot for a value passed between tasks of one run. It never
 * reports existing: memory does not outlive the process.
 */
export class MemoryTarget<T> implements Target {
  private slot: { value: T } | undefined;

  exists(): boolean {
    return false;
  }

  isSet(): boolean {
    return this.slot !== undefined;
  }

  set(value: T): void {
    if (this.slot) throw new TargetError("TARGET_ALREADY_SET", "Memory target set twice");
    this.slot = { value };
  }

  get(): T {
    if (!this.slot) throw new TargetError("TARGET_NOT_SET", "Memory target read before it was set");
    return this.slot.value;
  }

  delete(): void {
    if (!this.slot) throw new TargetError("TARGET_NOT_SET", "Memory target deleted before it was set");
    this.slot = undefined;
  }
}

export type LocalTargetFields = {
  file: string;
  /** Treat the file as missing so the producing task reruns. */
  force: boolean;
};

const LocalTargetFieldsSchema = z.object({
  file: z.string().min(1),
  force: z.boolean().default(false),
});

/**
 * A file on the local filesystem. Writes go through a temporary sibling path
 * that is renamed onto `file` only when the write succeeds.
 */
export class LocalTarget extends Bundle<LocalTargetFields> implements Target {
  readonly kind = "local";

  constructor(file: string, opts: { force?: boolean } = {}) {
    super({ file, force: opts.force ?? false });
  }

  get path(): string {
    return this.fields.file;
  }

  async exists(): Promise<boolean> {
    if (this.fields.force) return false;
    return pathExists(this.fields.file);
  }

  read(): Promise<string> {
    return readFile(this.fields.file, "utf8");
  }

  /**
   * Run `fn` against a fresh temporary path and commit it onto `file` once
   * `fn` resolves. Whatever is left at the temporary path afterwards is moved
   * to a `-FAILED-` sibling so a half-written file never looks finished.
   */
  async withTmpPath<R>(fn: (tmpPath: string) => Promise<R>): Promise<R> {
    const { tmpMarker, failedMarker } = getConfig().targets;
    const id = randomUUID();
    const tmpPath = `${this.fields.file}-${tmpMarker}-${id}`;
    await mkdir(dirname(tmpPath), { recursive: true });
    try {
      const result = await fn(tmpPath);
      await rename(tmpPath, this.fields.file);
      return result;
    } finally {
      if (await pathExists(tmpPath)) {
        const failedPath = `${this.fields.file}-${failedMarker}-${id}`;
        log.warn("Discarding failed write", { file: this.fields.file, movedTo: failedPath });
        await rename(tmpPath, failedPath);
      }
    }
  }

  async write(data: string | Uint8Array): Promise<void> {
    await this.withTmpPath((tmpPath) => writeFile(tmpPath, data));
  }

  async remove(): Promise<void> {
    await rm(this.fields.file, { force: true });
  }
}

bundles
  .register("no-target", () => NO_TARGET)
  .register("local", (fields) => {
    const parsed = parseOrThrow(
      LocalTargetFieldsSchema,
      fields,
      (message) => new BundleError("INVALID_BUNDLE", `Invalid local target: ${message}`),
    );
    return new LocalTarget(parsed.file, { force: parsed.force });
  });
