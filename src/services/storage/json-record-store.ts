import fs from 'fs-extra';
import path from 'path';
import type { ZodType } from 'zod';
import logger from '../../logger.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { CollaboratorUnavailableError, StateCorruptError } from '../../utils/workflow-errors.js';

export interface JsonRecordStoreOptions<T> {
  /** JSON file holding an object of key → record. */
  filePath: string;
  /** Validates each record as it is read. */
  schema: ZodType<T>;
  /** Used in error messages, e.g. "project plan". */
  recordLabel: string;
  /**
   * Extra consistency check between a key and its parsed record.
   * Returns a description of the problem, or null when consistent.
   */
  checkKey?: (key: string, record: T) => string | null;
}

type RawRecords = Record<string, unknown>;

function isRawRecords(value: unknown): value is RawRecords {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Prototype-free map, so keys such as `__proto__` stay own properties. */
function emptyRecords(): RawRecords {
  return Object.create(null);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keyed records persisted as one JSON object file.
 *
 * Reads validate only the requested record; writes replace only the given
 * key and leave every other entry exactly as found. A file that cannot be
 * parsed is never overwritten.
 */
export class JsonRecordStore<T> {
  private readonly filePath: string;
  private readonly schema: ZodType<T>;
  private readonly recordLabel: string;
  private readonly checkKey?: (key: string, record: T) => string | null;
  private readonly fileLock = new KeyedMutex();

  constructor(options: JsonRecordStoreOptions<T>) {
    this.filePath = options.filePath;
    this.schema = options.schema;
    this.recordLabel = options.recordLabel;
    this.checkKey = options.checkKey;
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Returns the validated record for `key`, or undefined when absent.
   *
   * @throws {StateCorruptError} if the file or the record is malformed.
   * @throws {CollaboratorUnavailableError} on I/O failure.
   */
  async get(key: string): Promise<T | undefined> {
    const records = await this.readRecords();
    if (!Object.prototype.hasOwnProperty.call(records, key)) {
      return undefined;
    }
    return this.validate(key, records[key]);
  }

  /** Whether an entry exists for `key`, valid or not. */
  async has(key: string): Promise<boolean> {
    const records = await this.readRecords();
    return Object.prototype.hasOwnProperty.call(records, key);
  }

  async keys(): Promise<string[]> {
    return Object.keys(await this.readRecords());
  }

  /**
   * Stores `record` under `key` with an atomic temp-file-and-rename write.
   * Concurrent writes to the same file are applied one at a time.
   */
  async put(key: string, record: T): Promise<void> {
    await this.fileLock.runExclusive(this.filePath, async () => {
      const records = await this.readRecords();
      records[key] = record;
      await this.writeRecords(records);
      logger.debug({ filePath: this.filePath, key }, `Persisted ${this.recordLabel}`);
    });
  }

  private validate(key: string, raw: unknown): T {
    const result = this.schema.safeParse(raw);
    if (!result.success) {
      throw new StateCorruptError(
        this.filePath,
        `${this.recordLabel} '${key}' failed validation`,
        JSON.stringify(raw, null, 2),
        { key, validationIssues: result.error.issues }
      );
    }

    const mismatch = this.checkKey?.(key, result.data);
    if (mismatch) {
      throw new StateCorruptError(
        this.filePath,
        `${this.recordLabel} '${key}' ${mismatch}`,
        JSON.stringify(raw, null, 2),
        { key }
      );
    }
    return result.data;
  }

  private async readRecords(): Promise<RawRecords> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return emptyRecords();
      }
      throw new CollaboratorUnavailableError(
        'persistence',
        `cannot read ${this.filePath}: ${describe(error)}`,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }

    if (content.trim() === '') {
      return emptyRecords();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StateCorruptError(
        this.filePath,
        `file is not valid JSON (${describe(error)})`,
        content,
        {},
        error instanceof Error ? error : undefined
      );
    }

    if (!isRawRecords(parsed)) {
      throw new StateCorruptError(this.filePath, 'top level must be a JSON object', content);
    }
    return Object.assign(emptyRecords(), parsed);
  }

  private async writeRecords(records: RawRecords): Promise<void> {
    const content = `${JSON.stringify(records, null, 2)}\n`;
    const tempFilePath = `${this.filePath}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 10)}`;

    try {
      await fs.ensureDir(path.dirname(this.filePath));
      await fs.writeFile(tempFilePath, content, 'utf-8');
      await fs.rename(tempFilePath, this.filePath);
    } catch (error) {
      try {
        await fs.remove(tempFilePath);
      } catch (cleanupError) {
        logger.warn({ tempFilePath, err: cleanupError }, 'Failed to remove temporary state file');
      }
      throw new CollaboratorUnavailableError(
        'persistence',
        `cannot write ${this.filePath}: ${describe(error)}`,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }
  }
}
