/**
 * @fileoverview MCP server configuration types
 */

import type { FindingSource } from '../api/analyze_build.js';
import type { FindingsStore } from '../storage/findings_store.js';
import { DEFAULT_FINDINGS_LIMIT } from '../triage/tiering.js';
import { SCHEMA_VERSION } from './schema.js';

export const MCP_SCHEMA_VERSION = SCHEMA_VERSION;

export interface TriageMCPServerConfig {
  /** Server name */
  name: string;

  /** Server version */
  version: string;

  /** Limit applied when analyze_build is called without one */
  defaultLimit: number;
}

export const DEFAULT_MCP_SERVER_CONFIG: TriageMCPServerConfig = {
  name: 'ci-triage-mcp-server',
  version: MCP_SCHEMA_VERSION,
  defaultLimit: DEFAULT_FINDINGS_LIMIT,
};

export interface TriageMCPServerOptions {
  source: FindingSource;
  /** Defaults to a fresh in-memory store */
  store?: FindingsStore;
  config?: Partial<TriageMCPServerConfig>;
}

export interface ServerInfo {
  name: string;
  version: string;
  defaultLimit: number;
}
