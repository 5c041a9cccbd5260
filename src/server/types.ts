export interface ServerOptions {
  /** Search root given on the command line; overrides MCP roots. */
  root?: string;
  debounceMs?: number;
  maxResults?: number;
}
