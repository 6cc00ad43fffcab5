/**
 * Configuration Store
 * Persisted key/value set of bootstrap parameters
 */

import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import { basename, dirname, join } from "path";
import * as dotenv from "dotenv";

export interface ConfigStore {
  get(key: string): Promise<string | undefined>;
  /** Overwrites any existing value; durable before the promise resolves. */
  set(key: string, value: string): Promise<void>;
  all(): Promise<Record<string, string>>;
}

// ============================================================================
// File Store
// ============================================================================

/**
 * `KEY="value"` file, one entry per line. Every `set` rewrites the whole file
 * through a temporary sibling and a rename, so a crash mid-write leaves the
 * previous content intact.
 */
export class FileConfigStore implements ConfigStore {
  private cache?: Map<string, string>;

  constructor(private readonly path: string) {}

  get location(): string {
    return this.path;
  }

  async get(key: string): Promise<string | undefined> {
    const entries = await this.load();
    return entries.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    const entries = await this.load();
    const next = new Map(entries);
    next.set(key, value);
    await this.persist(next);
    this.cache = next;
  }

  async all(): Promise<Record<string, string>> {
    return Object.fromEntries(await this.load());
  }

  private async load(): Promise<Map<string, string>> {
    if (this.cache) {
      return this.cache;
    }

    let content = "";
    try {
      content = await fs.readFile(this.path, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    this.cache = new Map(Object.entries(dotenv.parse(content)));
    return this.cache;
  }

  private async persist(entries: Map<string, string>): Promise<void> {
    const dir = dirname(this.path);
    await fs.mkdir(dir, { recursive: true });

    const tmp = join(
      dir,
      `.${basename(this.path)}.${randomBytes(6).toString("hex")}.tmp`,
    );
    try {
      await fs.writeFile(tmp, serializeEntries(entries), { mode: 0o600 });
      await fs.rename(tmp, this.path);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }
}

export function serializeEntries(entries: Map<string, string>): string {
  const lines = [...entries].map(([key, value]) => `${key}=${quote(value)}`);
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

// dotenv expands \n and \r inside double quotes only; single quotes and
// backticks are taken literally.
function quote(value: string): string {
  if (!/["\\]/.test(value)) {
    return `"${value}"`;
  }
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes("`")) {
    return `\`${value}\``;
  }
  throw new Error("Value cannot be stored: it contains every quote character");
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

// ============================================================================
// In-memory Store
// ============================================================================

export class MemoryConfigStore implements ConfigStore {
  private readonly entries: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async all(): Promise<Record<string, string>> {
    return Object.fromEntries(this.entries);
  }
}
