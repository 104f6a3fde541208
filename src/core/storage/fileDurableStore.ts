/**
 * Durable store persisted as one JSON document on disk.
 * Reads reuse the parsed document until the file's stamp (mtime and size)
 * changes. Writes re-read the file under the write lock, apply the change and
 * replace the file through a temp file and a rename, so changes made by
 * another process (the CLI against a running server) are kept.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { StorageError, toError } from "../errors";
import { DocumentDurableStore, DurableDocument } from "./durableStore";
import { KeyedMutex } from "./keyedMutex";

export interface FileDurableStoreConfig {
  filePath: string;
}

const DocumentSchema = z.object({
  options: z.record(z.unknown()).default({}),
  users: z.record(z.record(z.unknown())).default({}),
});

/** `missing` when the file does not exist */
type FileStamp = string;

const MISSING: FileStamp = "missing";

export class FileDurableStore extends DocumentDurableStore {
  private readonly filePath: string;
  private cached: { doc: DurableDocument; stamp: FileStamp } | null = null;
  private readonly writes = new KeyedMutex();

  constructor(config: FileDurableStoreConfig) {
    super();
    this.filePath = path.resolve(config.filePath);
  }

  protected async read(): Promise<DurableDocument> {
    const stamp = await this.stamp();
    if (this.cached && this.cached.stamp === stamp) {
      return this.cached.doc;
    }
    const doc = stamp === MISSING ? emptyDocument() : await this.readFromDisk();
    this.cached = { doc, stamp };
    return doc;
  }

  protected async update(mutate: (doc: DurableDocument) => boolean): Promise<void> {
    await this.writes.runExclusive(this.filePath, async () => {
      this.cached = null;
      const doc = await this.read();
      if (!mutate(doc)) return;

      const tmp = `${this.filePath}.${process.pid}.tmp`;
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(tmp, JSON.stringify(doc, null, 2), "utf-8");
        await fs.rename(tmp, this.filePath);
      } catch (error: unknown) {
        throw new StorageError("failed to write durable document", "save", this.filePath, toError(error));
      }
      this.cached = { doc, stamp: await this.stamp() };
    });
  }

  private async stamp(): Promise<FileStamp> {
    try {
      const stat = await fs.stat(this.filePath);
      return `${stat.mtimeMs}:${stat.size}`;
    } catch (error: unknown) {
      if (errorCode(error) === "ENOENT") return MISSING;
      throw new StorageError("failed to stat durable document", "load", this.filePath, toError(error));
    }
  }

  private async readFromDisk(): Promise<DurableDocument> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (error: unknown) {
      if (errorCode(error) === "ENOENT") {
        return emptyDocument();
      }
      throw new StorageError("failed to read durable document", "load", this.filePath, toError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      throw new StorageError("durable document is not valid JSON", "load", this.filePath, toError(error));
    }
    const result = DocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError("durable document has an unexpected shape", "load", this.filePath);
    }
    return result.data;
  }
}

function emptyDocument(): DurableDocument {
  return { options: {}, users: {} };
}

// fs errors can come from another realm (Jest sandboxes), so no instanceof
function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}
