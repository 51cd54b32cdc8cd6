/**
 * @fileoverview JSON Schema definitions and Zod validators for MCP Tool Inputs
 *
 * Zod does the runtime validation; the JSON Schemas are what `tools/list`
 * advertises to clients.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// SCHEMA VERSION
// ============================================================================

export const SCHEMA_VERSION = '1.0.0';
export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

export const MAX_ANALYZE_LIMIT = 200;

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

/**
 * analyze_build tool input schema
 */
export const AnalyzeBuildToolInputSchema = z.object({
  url: z.string().min(1).describe('Build URL (Buildkite or GitHub Actions)'),
  limit: z.number().int().min(1).max(MAX_ANALYZE_LIMIT).optional()
    .describe('Tier-1 capacity; tiers 2 and 3 scale from it'),
}).strict();

/**
 * get_finding_details tool input schema
 */
export const GetFindingDetailsToolInputSchema = z.object({
  request_id: z.string().min(1).describe('request_id from an analyze_build manifest'),
  finding_id: z.string().min(1).describe('Finding id from the manifest'),
}).strict();

export type AnalyzeBuildToolInput = z.infer<typeof AnalyzeBuildToolInputSchema>;
export type GetFindingDetailsToolInput = z.infer<typeof GetFindingDetailsToolInputSchema>;

/** Tool name to schema mapping */
export const TOOL_INPUT_SCHEMAS = {
  analyze_build: AnalyzeBuildToolInputSchema,
  get_finding_details: GetFindingDetailsToolInputSchema,
} as const;

export type ToolName = keyof typeof TOOL_INPUT_SCHEMAS;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, name);
}

// ============================================================================
// JSON SCHEMA DEFINITIONS
// ============================================================================

export interface JSONSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';
  description?: string;
  minLength?: number;
  minimum?: number;
  maximum?: number;
}

export interface JSONSchema {
  $schema: string;
  $id: string;
  title: string;
  description: string;
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required: string[];
  additionalProperties: false;
}

export const analyzeBuildToolJsonSchema: JSONSchema = {
  $schema: JSON_SCHEMA_DRAFT,
  $id: 'ci-triage://schemas/analyze-build-tool-input',
  title: 'AnalyzeBuildToolInput',
  description: 'Input for the analyze_build tool - triages a CI build into tiered findings',
  type: 'object',
  properties: {
    url: { type: 'string', description: 'Build URL (Buildkite or GitHub Actions)', minLength: 1 },
    limit: { type: 'integer', description: 'Tier-1 capacity; tiers 2 and 3 scale from it', minimum: 1, maximum: MAX_ANALYZE_LIMIT },
  },
  required: ['url'],
  additionalProperties: false,
};

export const getFindingDetailsToolJsonSchema: JSONSchema = {
  $schema: JSON_SCHEMA_DRAFT,
  $id: 'ci-triage://schemas/get-finding-details-tool-input',
  title: 'GetFindingDetailsToolInput',
  description: 'Input for the get_finding_details tool - full record behind a manifest entry',
  type: 'object',
  properties: {
    request_id: { type: 'string', description: 'request_id from an analyze_build manifest', minLength: 1 },
    finding_id: { type: 'string', description: 'Finding id from the manifest', minLength: 1 },
  },
  required: ['request_id', 'finding_id'],
  additionalProperties: false,
};

/** All JSON schemas */
export const JSON_SCHEMAS: Record<ToolName, JSONSchema> = {
  analyze_build: analyzeBuildToolJsonSchema,
  get_finding_details: getFindingDetailsToolJsonSchema,
};

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export interface ToolInputIssue {
  path: string;
  message: string;
  code: string;
}

export type ToolInputValidation =
  | { valid: true; tool: 'analyze_build'; data: AnalyzeBuildToolInput }
  | { valid: true; tool: 'get_finding_details'; data: GetFindingDetailsToolInput }
  | { valid: false; errors: ToolInputIssue[] };

function toIssues(error: z.ZodError): ToolInputIssue[] {
  return error.errors.map((err) => ({
    path: err.path.join('.') || '/',
    message: err.message,
    code: err.code,
  }));
}

/**
 * Validate tool input against schema
 */
export function validateToolInput(toolName: string, input: unknown): ToolInputValidation {
  switch (toolName) {
    case 'analyze_build': {
      const result = AnalyzeBuildToolInputSchema.safeParse(input);
      return result.success
        ? { valid: true, tool: 'analyze_build', data: result.data }
        : { valid: false, errors: toIssues(result.error) };
    }
    case 'get_finding_details': {
      const result = GetFindingDetailsToolInputSchema.safeParse(input);
      return result.success
        ? { valid: true, tool: 'get_finding_details', data: result.data }
        : { valid: false, errors: toIssues(result.error) };
    }
    default:
      return {
        valid: false,
        errors: [{ path: '', message: `Unknown tool: ${toolName}`, code: 'unknown_tool' }],
      };
  }
}

/**
 * Get JSON Schema for a tool
 */
export function getToolJsonSchema(toolName: string): JSONSchema | undefined {
  return isToolName(toolName) ? JSON_SCHEMAS[toolName] : undefined;
}

/**
 * List all available tool schemas
 */
export function listToolSchemas(): ToolName[] {
  return ['analyze_build', 'get_finding_details'];
}
