#!/usr/bin/env node
/**
 * @fileoverview `ci-triage-mcp` - serve build triage over MCP stdio
 *
 * Environment:
 *   CI_TRIAGE_FINDINGS_DIR   directory of finding bundles (default .ci-triage/findings)
 *   CI_TRIAGE_DEFAULT_LIMIT  tier-1 capacity when the caller passes none (default 20)
 *   CI_TRIAGE_LOG_LEVEL      debug | info | warn | error (default info)
 */

import { getErrorMessage, isTriageError } from '../core/errors.js';
import { main } from '../mcp/server.js';

main().catch((error: unknown) => {
  console.error('[MCP] Fatal error:', isTriageError(error) ? error.toUserMessage() : getErrorMessage(error));
  process.exit(1);
});
