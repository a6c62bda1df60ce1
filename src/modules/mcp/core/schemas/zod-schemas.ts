/**
 * MCP Module - Zod Schemas
 *
 * Tool input schemas handed to the MCP SDK. Parameter descriptors are only
 * shaped loosely here; the parameters module validates them in full and
 * reports every violation at once.
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Common Schemas
// ─────────────────────────────────────────────────────────────────────────────

const EntityIdSchema = z.number().int().positive();

/** Descriptor list, either as an array or as a JSON string holding one */
const ParametersArgSchema = z
  .union([z.array(z.record(z.unknown())), z.string()])
  .describe('Parameter descriptors: an array, or a JSON string encoding one');

const QuerySchema = z.string().min(1).describe('Native SQL query text with {{placeholders}}');

const VisualizationSettingsSchema = z
  .record(z.unknown())
  .describe('Visualization settings, passed through unchanged');

// ─────────────────────────────────────────────────────────────────────────────
// Documentation Tools
// ─────────────────────────────────────────────────────────────────────────────

export const GetParametersDocumentationInputZod = z.object({});

// ─────────────────────────────────────────────────────────────────────────────
// Validation Tools
// ─────────────────────────────────────────────────────────────────────────────

export const ValidateCardParametersInputZod = z.object({
  parameters: ParametersArgSchema,
  query: QuerySchema.optional().describe('Query to check the parameters against'),
});

export const ValidateDashboardParametersInputZod = z.object({
  parameters: ParametersArgSchema,
});

// ─────────────────────────────────────────────────────────────────────────────
// Card Tools
// ─────────────────────────────────────────────────────────────────────────────

export const CreateCardInputZod = z.object({
  name: z.string().min(1).describe('Card name'),
  database_id: EntityIdSchema.describe('Database the query runs against'),
  query: QuerySchema,
  parameters: ParametersArgSchema.optional(),
  collection_id: EntityIdSchema.optional().describe('Collection to save the card in'),
  description: z.string().optional(),
  display: z.string().default('table').describe('Visualization type'),
  visualization_settings: VisualizationSettingsSchema.optional(),
});

export const UpdateCardInputZod = z.object({
  card_id: EntityIdSchema.describe('Card to update'),
  name: z.string().min(1).optional(),
  query: QuerySchema.optional(),
  parameters: ParametersArgSchema.optional().describe(
    'Replaces all card parameters; descriptors without an id keep the id of the parameter with the same slug'
  ),
  collection_id: EntityIdSchema.optional(),
  description: z.string().optional(),
  archived: z.boolean().optional(),
  display: z.string().optional(),
  visualization_settings: VisualizationSettingsSchema.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Dashboard Tools
// ─────────────────────────────────────────────────────────────────────────────

const MappingInputSchema = z.object({
  dashcard_id: EntityIdSchema.describe('Dashboard card holding the target card'),
  dashboard_parameter_name: z.string().min(1),
  card_parameter_name: z.string().min(1).describe('Card parameter name or slug'),
});

export const UpdateDashboardParametersInputZod = z.object({
  dashboard_id: EntityIdSchema.describe('Dashboard to update'),
  parameters: ParametersArgSchema.describe(
    'Replaces all dashboard filters; descriptors without an id keep the id of the filter with the same name'
  ),
  mappings: z.array(MappingInputSchema).optional(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Inferred Types
// ─────────────────────────────────────────────────────────────────────────────

export type ValidateCardParametersInput = z.infer<typeof ValidateCardParametersInputZod>;
export type ValidateDashboardParametersInput = z.infer<typeof ValidateDashboardParametersInputZod>;
export type CreateCardInput = z.infer<typeof CreateCardInputZod>;
export type UpdateCardInput = z.infer<typeof UpdateCardInputZod>;
export type MappingInput = z.infer<typeof MappingInputSchema>;
export type UpdateDashboardParametersInput = z.infer<typeof UpdateDashboardParametersInputZod>;
