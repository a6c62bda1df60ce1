/**
 * MCP Module - Parameter Reference Checks
 *
 * Looks up the tables and cards that descriptors point at, so a filter bound
 * to a missing column is reported before anything is saved. Run after the
 * descriptors passed processing.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import {
  CARD_PARAMETERS_HINT,
  DASHBOARD_PARAMETERS_HINT,
  MCP_ERROR_CODES,
  createMcpError,
  type McpError,
} from './errors.js';
import {
  SourceCardSchema,
  TableMetadataSchema,
  type SourceCard,
} from './schemas/platform-payloads.js';
import { requestValidated } from './utils.js';
import { prefixFor } from '../../parameters/index.js';

import type { PlatformClient } from '../../platform/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Descriptors bound to a database column; other keys are ignored */
const FieldHolderSchema = Type.Object({
  name: Type.String(),
  field: Type.Object({
    database_id: Type.Integer(),
    table_id: Type.Integer(),
    field_id: Type.Integer(),
  }),
});

/** Descriptors reading their values from another card */
const CardSourceHolderSchema = Type.Object({
  name: Type.String(),
  values_source: Type.Object({
    type: Type.Literal('card'),
    card_id: Type.Integer(),
    value_field: Type.String(),
    label_field: Type.Optional(Type.String()),
  }),
});

interface ReferenceError {
  readonly index: number;
  readonly message: string;
}

type ReferenceCheck = Promise<Result<ReferenceError[], McpError>>;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Fetches each distinct id once, concurrently */
const fetchEach = async <T>(
  ids: readonly number[],
  fetchOne: (id: number) => Promise<Result<T, McpError>>
): Promise<Map<number, Result<T, McpError>>> => {
  const results = await Promise.all(
    [...new Set(ids)].map(async (id) => [id, await fetchOne(id)] as const)
  );
  return new Map(results);
};

const columnsOf = (card: SourceCard): string[] =>
  (card.result_metadata ?? []).map((column) => column.name);

// ─────────────────────────────────────────────────────────────────────────────
// Checks
// ─────────────────────────────────────────────────────────────────────────────

const checkFieldReferences = async (
  platform: PlatformClient,
  items: readonly unknown[]
): ReferenceCheck => {
  const holders = items.flatMap((item, index) =>
    Value.Check(FieldHolderSchema, item) ? [{ index, name: item.name, field: item.field }] : []
  );

  const tables = await fetchEach(
    holders.map((holder) => holder.field.table_id),
    (tableId) =>
      requestValidated(
        platform,
        'GET',
        `table/${String(tableId)}/query_metadata`,
        TableMetadataSchema,
        'table metadata'
      )
  );

  const errors: ReferenceError[] = [];
  for (const { index, name, field } of holders) {
    const table = tables.get(field.table_id);
    if (table === undefined) continue;
    const prefix = prefixFor(index, name);

    if (table.isErr()) {
      if (table.error.code !== MCP_ERROR_CODES.NOT_FOUND) return err(table.error);
      errors.push({
        index,
        message: `${prefix}: Cannot access table ${String(field.table_id)} in database ${String(field.database_id)}`,
      });
      continue;
    }
    if (!table.value.fields.some((column) => column.id === field.field_id)) {
      errors.push({
        index,
        message: `${prefix}: Field ${String(field.field_id)} not found in table ${String(field.table_id)}`,
      });
    }
  }
  return ok(errors);
};

const checkCardSourceReferences = async (
  platform: PlatformClient,
  items: readonly unknown[]
): ReferenceCheck => {
  const holders = items.flatMap((item, index) =>
    Value.Check(CardSourceHolderSchema, item)
      ? [{ index, name: item.name, source: item.values_source }]
      : []
  );

  const cards = await fetchEach(
    holders.map((holder) => holder.source.card_id),
    (cardId) =>
      requestValidated(platform, 'GET', `card/${String(cardId)}`, SourceCardSchema, 'card')
  );

  const errors: ReferenceError[] = [];
  for (const { index, name, source } of holders) {
    const card = cards.get(source.card_id);
    if (card === undefined) continue;
    const prefix = prefixFor(index, name);
    const cardId = String(source.card_id);

    if (card.isErr()) {
      if (card.error.code !== MCP_ERROR_CODES.NOT_FOUND) return err(card.error);
      errors.push({ index, message: `${prefix}: Cannot access card ${cardId} for values source` });
      continue;
    }

    const columns = columnsOf(card.value);
    if (columns.length === 0) {
      errors.push({
        index,
        message: `${prefix}: Card ${cardId} has no result metadata. Run the card first to use it as a values source.`,
      });
      continue;
    }

    const available = columns.join(', ');
    if (!columns.includes(source.value_field)) {
      errors.push({
        index,
        message: `${prefix}: Field '${source.value_field}' not found in card ${cardId}. Available fields: ${available}`,
      });
    }
    if (source.label_field !== undefined && !columns.includes(source.label_field)) {
      errors.push({
        index,
        message: `${prefix}: Label field '${source.label_field}' not found in card ${cardId}. Available fields: ${available}`,
      });
    }
  }
  return ok(errors);
};

/** Runs the checks together; all failures come back in one batch, by parameter */
const collect = async (
  checks: readonly ReferenceCheck[],
  hint: string
): Promise<Result<void, McpError>> => {
  const results = await Promise.all(checks);
  const errors: ReferenceError[] = [];
  for (const result of results) {
    if (result.isErr()) return err(result.error);
    errors.push(...result.value);
  }
  if (errors.length === 0) return ok(undefined);

  return err(
    createMcpError(
      MCP_ERROR_CODES.INVALID_PARAMETERS,
      `${String(errors.length)} parameter reference(s) could not be resolved`,
      {
        details: [...errors].sort((a, b) => a.index - b.index).map((error) => error.message),
        hint,
      }
    )
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/** Field filter columns and card values sources of card descriptors */
export const checkCardParameterReferences = (
  platform: PlatformClient,
  items: readonly unknown[]
): Promise<Result<void, McpError>> =>
  collect(
    [checkFieldReferences(platform, items), checkCardSourceReferences(platform, items)],
    CARD_PARAMETERS_HINT
  );

export const checkDashboardParameterReferences = (
  platform: PlatformClient,
  items: readonly unknown[]
): Promise<Result<void, McpError>> =>
  collect([checkCardSourceReferences(platform, items)], DASHBOARD_PARAMETERS_HINT);
