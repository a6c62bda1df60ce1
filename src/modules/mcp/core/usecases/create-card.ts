/**
 * MCP Use Case: create_card
 *
 * Creates a native query card with its filter parameters. The query is run
 * once before saving so that broken SQL never becomes a card.
 */

import { err, ok, type Result } from 'neverthrow';

import { CARD_PARAMETERS_HINT, toMcpError, type McpError } from '../errors.js';
import { checkCardParameterReferences } from '../reference-checks.js';
import { CreatedEntitySchema } from '../schemas/platform-payloads.js';
import { parseParametersArg, requestValidated, runNativeQuery } from '../utils.js';
import {
  checkQueryParameters,
  processCardParameters,
  toQueryDescriptors,
} from '../../../parameters/index.js';

import type { CreateCardInput } from '../schemas/zod-schemas.js';
import type { CreateCardOutput, PlatformDeps } from '../types.js';

export type CreateCardDeps = PlatformDeps;

/**
 * Creates a card from a query and simplified parameter descriptors.
 */
export async function createCard(
  deps: CreateCardDeps,
  input: CreateCardInput
): Promise<Result<CreateCardOutput, McpError>> {
  const { platform, ids } = deps;

  // 1. Parameters
  const parsed = parseParametersArg(input.parameters ?? []);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const processed = processCardParameters(parsed.value, { ids });
  if (processed.isErr()) {
    return err(toMcpError(processed.error, CARD_PARAMETERS_HINT));
  }
  const { templateTags, parameters } = processed.value;

  const references = await checkCardParameterReferences(platform, parsed.value);
  if (references.isErr()) {
    return err(references.error);
  }

  const warnings = checkQueryParameters(input.query, toQueryDescriptors(parsed.value));

  // 2. Query check
  const run = await runNativeQuery(platform, input.database_id, input.query, templateTags);
  if (run.isErr()) {
    return err(run.error);
  }

  // 3. Save
  const created = await requestValidated(platform, 'POST', 'card', CreatedEntitySchema, 'card', {
    name: input.name,
    type: 'question',
    display: input.display,
    visualization_settings: input.visualization_settings ?? {},
    dataset_query: {
      type: 'native',
      database: input.database_id,
      native: { query: input.query, 'template-tags': templateTags },
    },
    parameters,
    ...(input.description !== undefined && { description: input.description }),
    ...(input.collection_id !== undefined && { collection_id: input.collection_id }),
  });
  if (created.isErr()) {
    return err(created.error);
  }

  return ok({
    card_id: created.value.id,
    name: created.value.name,
    parameters_count: parameters.length,
    warnings,
  });
}
