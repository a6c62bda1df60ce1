/**
 * Parameters Use Case: resolve parameter mappings
 *
 * Turns name-based mapping requests into the id-based records the platform
 * stores on dashboard cards. Card parameters are fetched by the caller
 * beforehand and passed in as plain data.
 */

import { err, ok, type Result } from 'neverthrow';

import { createMappingResolutionError, type MappingResolutionError } from '../errors.js';

import type {
  CardParameterRef,
  DashboardParameterRef,
  MappingRequest,
  PlatformMapping,
} from '../types.js';

const listOrNone = (values: readonly string[]): string =>
  values.length > 0 ? values.join(', ') : '(none)';

/** Names and slugs, deduplicated, in card order */
const availableNames = (parameters: readonly CardParameterRef[]): string[] => [
  ...new Set(parameters.flatMap((parameter) => [parameter.name, parameter.slug])),
];

/**
 * Resolves every request or none.
 * All failures across the batch are reported together.
 */
export const resolveParameterMappings = (
  requests: readonly MappingRequest[],
  dashboardParameters: readonly DashboardParameterRef[],
  cardParameters: ReadonlyMap<number, readonly CardParameterRef[] | undefined>
): Result<PlatformMapping[], MappingResolutionError> => {
  const errors: string[] = [];
  const mappings: PlatformMapping[] = [];

  requests.forEach((request, index) => {
    const prefix = `Mapping ${String(index)}`;

    const dashboardParameter = dashboardParameters.find(
      (parameter) => parameter.name === request.dashboard_parameter_name
    );
    if (dashboardParameter === undefined) {
      errors.push(
        `${prefix}: dashboard parameter '${request.dashboard_parameter_name}' not found. Available: ${listOrNone(dashboardParameters.map((parameter) => parameter.name))}`
      );
    }

    const candidates = cardParameters.get(request.card_id);
    if (candidates === undefined) {
      errors.push(`${prefix}: parameters of card ${String(request.card_id)} are not available`);
      return;
    }

    const cardParameter =
      candidates.find((parameter) => parameter.name === request.card_parameter_name) ??
      candidates.find((parameter) => parameter.slug === request.card_parameter_name);
    if (cardParameter === undefined) {
      errors.push(
        `${prefix}: card parameter '${request.card_parameter_name}' not found on card ${String(request.card_id)}. Available: ${listOrNone(availableNames(candidates))}`
      );
      return;
    }

    if (cardParameter.target === undefined || cardParameter.target === null) {
      errors.push(
        `${prefix}: card parameter '${cardParameter.name}' on card ${String(request.card_id)} has no target`
      );
      return;
    }

    if (dashboardParameter !== undefined) {
      mappings.push({
        dashcard_id: request.dashcard_id,
        card_id: request.card_id,
        parameter_id: dashboardParameter.id,
        target: cardParameter.target,
      });
    }
  });

  return errors.length > 0 ? err(createMappingResolutionError(errors)) : ok(mappings);
};
