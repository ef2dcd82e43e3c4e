/**
 * Request schemas shared by the HTTP routes and the MCP tools.
 * Wire fields are snake_case; ids may be sent as numbers.
 */

import { z } from 'zod';

const id = z.union([z.string(), z.number()]).transform(v => String(v));

export const ContextRequestSchema = z.object({
  query: z.string().trim().min(1).describe('Question or search text'),
  project_id: id.optional().describe('Restrict to one project'),
  item_id: id.optional().describe('Restrict to objects belonging to this item'),
  current_item_id: id.optional().describe('Exclude this object from the results'),
  object_types: z
    .array(z.string())
    .optional()
    .describe('Object types to include. Default: item, github_issue, github_pr, attachment. [] = all types'),
  limit: z.number().int().min(1).max(100).optional().describe('Max results. Default: 20'),
  alpha: z.number().min(0).max(1).optional().describe('Hybrid weight, 0 = keyword, 1 = vector. Default: heuristic'),
  include_debug: z.boolean().optional(),
});

export const ExtendedContextRequestSchema = z.object({
  query: z.string().trim().min(1).describe('Question to answer'),
  project_id: id.optional().describe('Restrict to one project'),
  item_id: id.optional().describe('Item the question is about; its objects rank higher'),
  current_item_id: id.optional().describe('Exclude this object from the results'),
  object_types: z.array(z.string()).optional().describe('Object types to include. [] = all types'),
  skip_optimization: z.boolean().optional().describe('Search with the raw question'),
  include_debug: z.boolean().optional(),
});

export const AgentExecuteSchema = z.object({
  input: z.string().describe('Input text for the agent'),
  parameters: z.record(z.unknown()).optional().describe('Extra parameters listed in the prompt'),
});

export const JobsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
  agent: z.string().optional(),
});

export type ContextRequestBody = z.infer<typeof ContextRequestSchema>;
export type ExtendedContextRequestBody = z.infer<typeof ExtendedContextRequestSchema>;
