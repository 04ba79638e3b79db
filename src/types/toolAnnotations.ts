/**
 * MCP tool annotations. These are advisory hints for clients and are not
 * enforced by the server.
 */
export type MCPToolAnnotations = {
  /** Human-readable title, e.g. "YNAB: Get Accounts" */
  title?: string;
  /** The tool reads data and changes nothing */
  readOnlyHint?: boolean;
  /** The tool may irreversibly change or remove data */
  destructiveHint?: boolean;
  /** Calling the tool twice with the same input has the same effect as once */
  idempotentHint?: boolean;
  /** The tool talks to the YNAB API rather than only local state */
  openWorldHint?: boolean;
};
