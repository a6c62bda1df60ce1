/**
 * MCP Use Case: update_dashboard_parameters
 *
 * Replaces a dashboard's filters and optionally connects them to the
 * parameters of its cards. Mappings are resolved by name, all or nothing.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  DASHBOARD_PARAMETERS_HINT,
  MCP_ERROR_CODES,
  toMcpError,
  type McpError,
} from '../errors.js';
import { checkDashboardParameterReferences } from '../reference-checks.js';
import {
  CreatedEntitySchema,
  PlatformCardSchema,
  PlatformDashboardSchema,
  type PlatformDashcard,
  type PlatformParameter,
} from '../schemas/platform-payloads.js';
import { parseParametersArg, preserveDashboardParameterIds, requestValidated } from '../utils.js';
import {
  createMappingResolutionError,
  processDashboardParameters,
  resolveParameterMappings,
  type MappingRequest,
  type PlatformMapping,
} from '../../../parameters/index.js';

import type { MappingInput, UpdateDashboardParametersInput } from '../schemas/zod-schemas.js';
import type { PlatformDeps, UpdateDashboardParametersOutput } from '../types.js';
import type { PlatformClient } from '../../../platform/index.js';

export type UpdateDashboardParametersDeps = PlatformDeps;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Attaches the card behind each dashcard; unknown dashcards are collected as errors */
const toMappingRequests = (
  mappings: readonly MappingInput[],
  dashcards: readonly PlatformDashcard[],
  dashboardId: number
): Result<MappingRequest[], McpError> => {
  const byId = new Map(dashcards.map((dashcard) => [dashcard.id, dashcard]));
  const available = dashcards.map((dashcard) => String(dashcard.id)).join(', ') || '(none)';
  const errors: string[] = [];
  const requests: MappingRequest[] = [];

  mappings.forEach((mapping, index) => {
    const dashcard = byId.get(mapping.dashcard_id);
    if (dashcard === undefined) {
      errors.push(
        `Mapping ${String(index)}: dashcard ${String(mapping.dashcard_id)} not found on dashboard ${String(dashboardId)}. Available: ${available}`
      );
      return;
    }
    if (dashcard.card_id === null) {
      errors.push(`Mapping ${String(index)}: dashcard ${String(mapping.dashcard_id)} has no card`);
      return;
    }
    requests.push({ ...mapping, card_id: dashcard.card_id });
  });

  return errors.length > 0
    ? err(toMcpError(createMappingResolutionError(errors)))
    : ok(requests);
};

/** Fetches each card once. A card that no longer exists maps to undefined. */
const fetchCardParameters = async (
  platform: PlatformClient,
  cardIds: readonly number[]
): Promise<Result<Map<number, PlatformParameter[] | undefined>, McpError>> => {
  const results = await Promise.all(
    cardIds.map(async (cardId) => ({
      cardId,
      result: await requestValidated(
        platform,
        'GET',
        `card/${String(cardId)}`,
        PlatformCardSchema,
        'card'
      ),
    }))
  );

  const parametersByCard = new Map<number, PlatformParameter[] | undefined>();
  for (const { cardId, result } of results) {
    if (result.isOk()) {
      parametersByCard.set(cardId, result.value.parameters ?? []);
    } else if (result.error.code === MCP_ERROR_CODES.NOT_FOUND) {
      parametersByCard.set(cardId, undefined);
    } else {
      return err(result.error);
    }
  }
  return ok(parametersByCard);
};

/**
 * Drops mappings to removed filters and those replaced by `resolved`,
 * then adds the resolved ones.
 */
const mergeMappings = (
  dashcards: readonly PlatformDashcard[],
  parameterIds: ReadonlySet<string>,
  resolved: readonly PlatformMapping[]
): PlatformDashcard[] =>
  dashcards.map((dashcard) => {
    const incoming = resolved.filter((mapping) => mapping.dashcard_id === dashcard.id);
    const replaced = new Set(incoming.map((mapping) => mapping.parameter_id));
    const kept = (dashcard.parameter_mappings ?? []).filter(
      (mapping) => parameterIds.has(mapping.parameter_id) && !replaced.has(mapping.parameter_id)
    );
    return {
      ...dashcard,
      parameter_mappings: [
        ...kept,
        ...incoming.map((mapping) => ({
          parameter_id: mapping.parameter_id,
          card_id: mapping.card_id,
          target: mapping.target,
        })),
      ],
    };
  });

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export async function updateDashboardParameters(
  deps: UpdateDashboardParametersDeps,
  input: UpdateDashboardParametersInput
): Promise<Result<UpdateDashboardParametersOutput, McpError>> {
  const { platform, ids } = deps;
  const path = `dashboard/${String(input.dashboard_id)}`;

  // 1. Current state
  const current = await requestValidated(
    platform,
    'GET',
    path,
    PlatformDashboardSchema,
    'dashboard'
  );
  if (current.isErr()) {
    return err(current.error);
  }
  const dashboard = current.value;
  const existingParameters = dashboard.parameters ?? [];
  const dashcards = dashboard.dashcards ?? [];

  // 2. Parameters
  const parsed = parseParametersArg(input.parameters);
  if (parsed.isErr()) {
    return err(parsed.error);
  }
  const descriptors = preserveDashboardParameterIds(parsed.value, existingParameters);

  const processed = processDashboardParameters(descriptors, {
    ids,
    existingIds: new Set(existingParameters.map((parameter) => parameter.id)),
  });
  if (processed.isErr()) {
    return err(toMcpError(processed.error, DASHBOARD_PARAMETERS_HINT));
  }
  const { parameters } = processed.value;

  const references = await checkDashboardParameterReferences(platform, descriptors);
  if (references.isErr()) {
    return err(references.error);
  }

  // 3. Mappings
  let resolved: PlatformMapping[] = [];
  const mappings = input.mappings ?? [];
  if (mappings.length > 0) {
    const requests = toMappingRequests(mappings, dashcards, input.dashboard_id);
    if (requests.isErr()) {
      return err(requests.error);
    }

    const cardIds = [...new Set(requests.value.map((request) => request.card_id))];
    const cardParameters = await fetchCardParameters(platform, cardIds);
    if (cardParameters.isErr()) {
      return err(cardParameters.error);
    }

    const result = resolveParameterMappings(requests.value, parameters, cardParameters.value);
    if (result.isErr()) {
      return err(toMcpError(result.error));
    }
    resolved = result.value;
  }

  // 4. Save
  const parameterIds = new Set(parameters.map((parameter) => parameter.id));
  const saved = await requestValidated(platform, 'PUT', path, CreatedEntitySchema, 'dashboard', {
    parameters,
    ...(dashboard.dashcards !== undefined && {
      dashcards: mergeMappings(dashcards, parameterIds, resolved),
    }),
  });
  if (saved.isErr()) {
    return err(saved.error);
  }

  return ok({
    dashboard_id: saved.value.id,
    parameters: parameters.map(({ id, name, slug, type }) => ({ id, name, slug, type })),
    mappings_count: resolved.length,
  });
}
