/**
 * Durable store contract: site options and user-scoped fields that survive
 * cache eviction and restarts. Nothing here expires on its own.
 */

export interface DurableStore {
  /** `undefined` when the option was never written */
  getOption(name: string): Promise<unknown>;
  updateOption(name: string, value: unknown): Promise<void>;
  deleteOption(name: string): Promise<void>;
  getUserField(userId: string, field: string): Promise<unknown>;
  updateUserField(userId: string, field: string, value: unknown): Promise<void>;
  deleteUserField(userId: string, field: string): Promise<void>;
}

export interface DurableDocument {
  options: Record<string, unknown>;
  users: Record<string, Record<string, unknown>>;
}

function copy(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}

/**
 * Shared document-backed implementation. Reads and writes go through JSON
 * copies so callers never hold a reference into the document. Every change
 * is a `mutate` callback applied by the subclass to the current document;
 * returning false skips the write.
 */
export abstract class DocumentDurableStore implements DurableStore {
  protected abstract read(): Promise<DurableDocument>;
  protected abstract update(mutate: (doc: DurableDocument) => boolean): Promise<void>;

  async getOption(name: string): Promise<unknown> {
    const doc = await this.read();
    return copy(doc.options[name]);
  }

  async updateOption(name: string, value: unknown): Promise<void> {
    const stored = copy(value);
    await this.update((doc) => {
      doc.options[name] = stored;
      return true;
    });
  }

  async deleteOption(name: string): Promise<void> {
    await this.update((doc) => {
      if (!(name in doc.options)) return false;
      delete doc.options[name];
      return true;
    });
  }

  async getUserField(userId: string, field: string): Promise<unknown> {
    const doc = await this.read();
    return copy(doc.users[userId]?.[field]);
  }

  async updateUserField(userId: string, field: string, value: unknown): Promise<void> {
    const stored = copy(value);
    await this.update((doc) => {
      const fields = doc.users[userId] ?? {};
      fields[field] = stored;
      doc.users[userId] = fields;
      return true;
    });
  }

  async deleteUserField(userId: string, field: string): Promise<void> {
    await this.update((doc) => {
      const fields = doc.users[userId];
      if (!fields || !(field in fields)) return false;
      delete fields[field];
      if (Object.keys(fields).length === 0) {
        delete doc.users[userId];
      }
      return true;
    });
  }
}

export class MemoryDurableStore extends DocumentDurableStore {
  private doc: DurableDocument = { options: {}, users: {} };

  protected async read(): Promise<DurableDocument> {
    return this.doc;
  }

  protected async update(mutate: (doc: DurableDocument) => boolean): Promise<void> {
    mutate(this.doc);
  }

  snapshot(): DurableDocument {
    return JSON.parse(JSON.stringify(this.doc));
  }
}
