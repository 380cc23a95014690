/** Bare model id prefixes and the upstream namespace each one routes to. */
export const MODEL_NAMESPACE_PREFIXES: ReadonlyArray<
  readonly [prefix: string, namespace: string]
> = [
  ['claude-', 'anthropic'],
  ['gemini-', 'google'],
] as const;

export const NAMESPACE_SEPARATOR = '/';

/** Parent id LibreChat uses for the first message of a conversation. */
export const ROOT_PARENT_MESSAGE_ID = '00000000-0000-0000-0000-000000000000';

// Sentinel that makes LibreChat clear every MCP server for the turn
export const NO_MCP_SERVERS = 'sys__clear__sys';
