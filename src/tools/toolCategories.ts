import type { MCPToolAnnotations } from '../types/toolAnnotations.js';

/**
 * Annotation presets by tool category. Spread the preset first and add the
 * tool's own `title` after it.
 *
 * @example
 * metadata: {
 *   annotations: { ...ToolAnnotationPresets.READ_ONLY_EXTERNAL, title: 'YNAB: Get Budgets' },
 * }
 */
export const ToolAnnotationPresets = {
  /** Queries YNAB without changing anything (get_budgets, get_accounts, get_categories) */
  READ_ONLY_EXTERNAL: {
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },

  /** Creates new YNAB data; repeating the call creates another record */
  WRITE_EXTERNAL_CREATE: {
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: false,
    openWorldHint: true,
  },

  /** Updates existing YNAB data, e.g. categorize_transaction */
  WRITE_EXTERNAL_UPDATE: {
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },

  /** Reads YNAB and overwrites local state, e.g. cache_categories */
  WRITE_LOCAL_FROM_EXTERNAL: {
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },

  /** Touches only local state, e.g. set_preferred_budget_id */
  WRITE_LOCAL: {
    readOnlyHint: false,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },
} as const satisfies Record<string, Omit<MCPToolAnnotations, 'title'>>;
