/**
 * MCP Module - Schemas Index
 */

// Tool inputs
export {
  GetParametersDocumentationInputZod,
  ValidateCardParametersInputZod,
  ValidateDashboardParametersInputZod,
  CreateCardInputZod,
  UpdateCardInputZod,
  UpdateDashboardParametersInputZod,
  type ValidateCardParametersInput,
  type ValidateDashboardParametersInput,
  type CreateCardInput,
  type UpdateCardInput,
  type MappingInput,
  type UpdateDashboardParametersInput,
} from './zod-schemas.js';

// Platform payloads
export {
  PlatformParameterSchema,
  PlatformCardSchema,
  PlatformParameterMappingSchema,
  PlatformDashcardSchema,
  PlatformDashboardSchema,
  SourceCardSchema,
  TableMetadataSchema,
  CreatedEntitySchema,
  QueryRunSchema,
  type PlatformParameter,
  type PlatformCard,
  type PlatformParameterMapping,
  type PlatformDashcard,
  type PlatformDashboard,
  type SourceCard,
  type TableMetadata,
} from './platform-payloads.js';
