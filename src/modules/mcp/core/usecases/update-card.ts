/**
 * MCP Use Case: update_card
 *
 * Partial card update. New parameters replace the old ones, keeping the ids
 * of parameters whose slug did not change so dashboard mappings survive.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  CARD_PARAMETERS_HINT,
  invalidInputError,
  toMcpError,
  unexpectedResponseError,
  type McpError,
} from '../errors.js';
import { checkCardParameterReferences } from '../reference-checks.js';
import { CreatedEntitySchema, PlatformCardSchema } from '../schemas/platform-payloads.js';
import {
  parseParametersArg,
  preserveCardParameterIds,
  requestValidated,
  runNativeQuery,
} from '../utils.js';
import {
  checkQueryParameters,
  processCardParameters,
  toQueryDescriptors,
  type ProcessedCardParameters,
  type QueryWarning,
} from '../../../parameters/index.js';

import type { UpdateCardInput } from '../schemas/zod-schemas.js';
import type { PlatformDeps, UpdateCardOutput } from '../types.js';

export type UpdateCardDeps = PlatformDeps;

/** Fields copied to the request body as given */
const PASSTHROUGH_FIELDS = [
  'name',
  'description',
  'collection_id',
  'archived',
  'display',
  'visualization_settings',
] as const;

/**
 * Updates the given fields of a card.
 * Warnings are only computed when parameters are replaced.
 */
export async function updateCard(
  deps: UpdateCardDeps,
  input: UpdateCardInput
): Promise<Result<UpdateCardOutput, McpError>> {
  const { platform, ids } = deps;
  const path = `card/${String(input.card_id)}`;

  // 1. Current state
  const current = await requestValidated(platform, 'GET', path, PlatformCardSchema, 'card');
  if (current.isErr()) {
    return err(current.error);
  }
  const card = current.value;
  const existingParameters = card.parameters ?? [];

  const body: Record<string, unknown> = {};
  const updatedFields: string[] = [];
  for (const field of PASSTHROUGH_FIELDS) {
    if (input[field] !== undefined) {
      body[field] = input[field];
      updatedFields.push(field);
    }
  }

  // 2. Parameters
  let processed: ProcessedCardParameters | undefined;
  let descriptors: unknown[] = [];
  if (input.parameters !== undefined) {
    const parsed = parseParametersArg(input.parameters);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    descriptors = preserveCardParameterIds(parsed.value, existingParameters);

    const result = processCardParameters(descriptors, { ids });
    if (result.isErr()) {
      return err(toMcpError(result.error, CARD_PARAMETERS_HINT));
    }

    const references = await checkCardParameterReferences(platform, descriptors);
    if (references.isErr()) {
      return err(references.error);
    }
    processed = result.value;
    body['parameters'] = processed.parameters;
    updatedFields.push('parameters');
  }

  // 3. Query
  const datasetQuery = card.dataset_query;
  const native = datasetQuery?.native;
  const queryText = input.query ?? native?.query;

  if (input.query !== undefined || processed !== undefined) {
    if (datasetQuery === undefined || native === undefined || queryText === undefined) {
      return err(
        invalidInputError(`Card ${String(input.card_id)} is not a native query card`)
      );
    }
    const templateTags = processed?.templateTags ?? native['template-tags'] ?? {};

    if (input.query !== undefined) {
      if (datasetQuery.database === undefined) {
        return err(unexpectedResponseError('card'));
      }
      const run = await runNativeQuery(platform, datasetQuery.database, input.query, templateTags);
      if (run.isErr()) {
        return err(run.error);
      }
      updatedFields.push('query');
    }

    body['dataset_query'] = {
      ...datasetQuery,
      type: 'native',
      native: { ...native, query: queryText, 'template-tags': templateTags },
    };
  }

  if (updatedFields.length === 0) {
    return err(invalidInputError('No fields to update'));
  }

  // 4. Save
  const saved = await requestValidated(platform, 'PUT', path, CreatedEntitySchema, 'card', body);
  if (saved.isErr()) {
    return err(saved.error);
  }

  const warnings: QueryWarning[] =
    processed !== undefined && queryText !== undefined
      ? checkQueryParameters(queryText, toQueryDescriptors(descriptors))
      : [];

  return ok({
    card_id: saved.value.id,
    updated_fields: updatedFields,
    parameters_count: processed?.parameters.length ?? existingParameters.length,
    warnings,
  });
}
