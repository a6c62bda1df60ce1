/**
 * MCP Module - Platform Payload Schemas
 *
 * The parts of card and dashboard payloads the tools read back.
 * Objects stay open: unknown properties are kept and sent back untouched.
 */

import { Type, type Static } from '@sinclair/typebox';

export const PlatformParameterSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  slug: Type.String(),
  target: Type.Optional(Type.Unknown()),
});

export const PlatformCardSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  dataset_query: Type.Optional(
    Type.Object({
      type: Type.Optional(Type.String()),
      database: Type.Optional(Type.Integer()),
      native: Type.Optional(
        Type.Object({
          query: Type.Optional(Type.String()),
          'template-tags': Type.Optional(Type.Record(Type.String(), Type.Unknown())),
        })
      ),
    })
  ),
  parameters: Type.Optional(Type.Array(PlatformParameterSchema)),
});

export const PlatformParameterMappingSchema = Type.Object({
  parameter_id: Type.String(),
  card_id: Type.Optional(Type.Integer()),
  target: Type.Unknown(),
});

export const PlatformDashcardSchema = Type.Object({
  id: Type.Integer(),
  card_id: Type.Union([Type.Integer(), Type.Null()]),
  parameter_mappings: Type.Optional(Type.Array(PlatformParameterMappingSchema)),
});

export const PlatformDashboardSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  parameters: Type.Optional(Type.Array(PlatformParameterSchema)),
  dashcards: Type.Optional(Type.Array(PlatformDashcardSchema)),
});

/** Result columns are only known once the card has run */
export const SourceCardSchema = Type.Object({
  id: Type.Integer(),
  result_metadata: Type.Optional(
    Type.Union([Type.Array(Type.Object({ name: Type.String() })), Type.Null()])
  ),
});

export const TableMetadataSchema = Type.Object({
  id: Type.Integer(),
  fields: Type.Array(Type.Object({ id: Type.Integer() })),
});

export const CreatedEntitySchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
});

/** Query runs answer 2xx with `status: 'failed'` when the SQL itself fails */
export const QueryRunSchema = Type.Object({
  status: Type.Optional(Type.String()),
  error: Type.Optional(Type.Unknown()),
});

export type PlatformParameter = Static<typeof PlatformParameterSchema>;
export type PlatformCard = Static<typeof PlatformCardSchema>;
export type PlatformParameterMapping = Static<typeof PlatformParameterMappingSchema>;
export type PlatformDashcard = Static<typeof PlatformDashcardSchema>;
export type PlatformDashboard = Static<typeof PlatformDashboardSchema>;
export type SourceCard = Static<typeof SourceCardSchema>;
export type TableMetadata = Static<typeof TableMetadataSchema>;
