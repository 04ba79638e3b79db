import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod/v4';
import { fromZodError } from 'zod-validation-error';
import { IOFailureError, isMissingFile } from '../utils/errors.js';
import { globalRequestLogger, type Logger } from './requestLogger.js';

export const CategoryCacheEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  group: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
});

const CategoryCacheFileSchema = z.record(z.string(), z.array(CategoryCacheEntrySchema));

export type CategoryCacheEntry = z.infer<typeof CategoryCacheEntrySchema>;

/**
 * Per-budget category summaries backed by a JSON file.
 *
 * Entries never expire: a budget's list stays as written until the next
 * {@link refresh} for that budget replaces it wholesale.
 */
export class CategoryCache {
  private entries = new Map<string, CategoryCacheEntry[]>();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = globalRequestLogger,
  ) {}

  getFilePath(): string {
    return this.filePath;
  }

  load(): Map<string, CategoryCacheEntry[]> {
    this.entries = new Map();

    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn('Could not read category cache, starting empty', {
          path: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return new Map(this.entries);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Category cache is not valid JSON, starting empty', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return new Map(this.entries);
    }

    const result = CategoryCacheFileSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Category cache has an unexpected shape, starting empty', {
        path: this.filePath,
        error: fromZodError(result.error).message,
      });
      return new Map(this.entries);
    }

    for (const [budgetId, list] of Object.entries(result.data)) {
      this.entries.set(budgetId, list);
    }
    return new Map(this.entries);
  }

  get(budgetId: string): CategoryCacheEntry[] {
    return [...(this.entries.get(budgetId) ?? [])];
  }

  budgetIds(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Replace the cached list for a budget and rewrite the whole file.
   *
   * @throws IOFailureError when the file cannot be written
   */
  refresh(budgetId: string, categories: readonly CategoryCacheEntry[]): void {
    this.entries.set(
      budgetId,
      categories.map(({ id, name, group }) => ({ id, name, group })),
    );

    const serialized: Record<string, CategoryCacheEntry[]> = {};
    for (const key of this.budgetIds()) {
      serialized[key] = this.entries.get(key) ?? [];
    }

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(serialized, null, 2), 'utf8');
    } catch (error) {
      throw new IOFailureError(this.filePath, 'write', error);
    }
    this.logger.debug('Category cache refreshed', { budgetId, count: categories.length });
  }
}
