import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { ConfigIOError } from '../shared/errors.js';

// Wrong-shaped fields fall back to [] so the rest of the document survives a merge-write.
const ConfigDocumentSchema = z.object({
  history: z.array(z.string()).catch([]).default([]),
  pinned: z.array(z.string()).catch([]).default([]),
}).passthrough();

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
export type ConfigPatch = Partial<ConfigDocument> & Record<string, unknown>;

export function defaultConfig(): ConfigDocument {
  return { history: [], pinned: [] };
}

/**
 * JSON document persisted at a fixed per-user path.
 *
 * Reads never throw: an unreadable or corrupt file yields the defaults.
 * Read-merge-write sequences of one store are queued so concurrent callers
 * cannot drop each other's updates, and each write lands through a rename.
 */
export class ConfigStore {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(readonly file: string) {}

  async load(): Promise<ConfigDocument> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        logger.debug({ file: this.file }, 'config_not_found_using_defaults');
      } else {
        logger.warn({ err: new ConfigIOError(this.file, err) }, 'config_load_failed');
      }
      return defaultConfig();
    }
    try {
      const r = ConfigDocumentSchema.safeParse(JSON.parse(raw));
      if (!r.success) {
        logger.warn({ file: this.file, issues: r.error.issues }, 'config_document_invalid');
        return defaultConfig();
      }
      return r.data;
    } catch (err) {
      logger.warn({ err: new ConfigIOError(this.file, err) }, 'config_load_failed');
      return defaultConfig();
    }
  }

  /** Shallow-merge `patch` over the stored document. */
  save(patch: ConfigPatch): Promise<ConfigDocument> {
    return this.update(current => ({ ...current, ...patch }));
  }

  /**
   * Atomic read-modify-write. The mutator sees the document as persisted by
   * every update queued before it.
   */
  update(mutator: (current: ConfigDocument) => ConfigDocument): Promise<ConfigDocument> {
    const run = this.tail.then(async () => {
      const current = await this.load();
      const next = mutator(current);
      await this.write(next);
      return next;
    });
    this.tail = run.catch(() => undefined);
    return run;
  }

  /** Resolves once every queued update has been written. */
  async flush(): Promise<void> {
    await this.tail;
  }

  private async write(doc: ConfigDocument) {
    const tmp = path.join(path.dirname(this.file), `.${path.basename(this.file)}.${process.pid}.tmp`);
    try {
      await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(doc), 'utf8');
      await fs.promises.rename(tmp, this.file);
    } catch (err) {
      logger.error({ err: new ConfigIOError(this.file, err) }, 'config_save_failed');
      await fs.promises.rm(tmp, { force: true }).catch(() => undefined);
    }
  }
}

function isMissingFile(err: unknown) {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
