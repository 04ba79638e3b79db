import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { IOFailureError, isMissingFile } from '../utils/errors.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';

/**
 * Persists the preferred budget id as the raw contents of a single file.
 *
 * The value is read once by {@link load} and kept in memory; {@link set}
 * rewrites the file synchronously. There is no locking, so concurrent writers
 * from separate processes race and the last write wins.
 */
export class PreferenceStore {
  private value: string | undefined;

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = globalRequestLogger,
  ) {}

  getFilePath(): string {
    return this.filePath;
  }

  load(): string | undefined {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn('Could not read preferred budget file', {
          path: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.value = undefined;
      return undefined;
    }

    const trimmed = raw.trim();
    this.value = trimmed.length > 0 ? trimmed : undefined;
    return this.value;
  }

  get(): string | undefined {
    return this.value;
  }

  /**
   * @throws IOFailureError when the file cannot be written; the in-memory
   * value is updated regardless
   */
  set(value: string): void {
    this.value = value;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, value, 'utf8');
    } catch (error) {
      throw new IOFailureError(this.filePath, 'write', error);
    }
    this.logger.debug('Preferred budget id saved', { path: this.filePath });
  }
}
