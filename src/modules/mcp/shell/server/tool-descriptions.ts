/**
 * MCP Tool Descriptions
 *
 * Descriptions for each MCP tool with inputs, outputs and workflow notes.
 */

export const GET_CARD_PARAMETERS_DOCUMENTATION_DESCRIPTION = `Get the reference for card (question) parameter descriptors.

**Call this first** when creating or updating a card with filters.

**Output:**
- schema: JSON Schema of one descriptor
- types: simple variable types and field filter types
- widgets, values_sources: what each option does and where it is allowed
- rules and common_mistakes, with a worked descriptor list`;

export const GET_DASHBOARD_PARAMETERS_DOCUMENTATION_DESCRIPTION = `Get the reference for dashboard filter descriptors.

**Call this first** when changing dashboard filters.

**Output:**
- schema: JSON Schema of one descriptor
- types: text, location, number, date and temporal-unit filter types
- rules for multi-select, temporal units and mappings
- common_mistakes, with a worked descriptor list`;

export const VALIDATE_CARD_PARAMETERS_DESCRIPTION = `Check card parameter descriptors without saving anything.

**Input:**
- parameters: descriptor array (or a JSON string holding one)
- query (optional): SQL to check the descriptors against

**Output:**
- valid, parameters_count
- errors: every violation, one line each, prefixed with "Parameter i (name)"
- warnings: placeholder problems in the query (missing or unused parameters, quoted placeholders, field filters compared to a value, required placeholders without a default)`;

export const VALIDATE_DASHBOARD_PARAMETERS_DESCRIPTION = `Check dashboard filter descriptors without saving anything.

**Input:**
- parameters: descriptor array (or a JSON string holding one)

**Output:**
- valid, parameters_count
- errors: every violation, one line each`;

export const CREATE_CARD_DESCRIPTION = `Create a native SQL card with filter parameters.

**Input:**
- name, database_id, query (required)
- parameters: descriptor array; each name must appear in the query as {{name}}
- collection_id, description, display (default "table"), visualization_settings

**Behavior:**
- Parameters are validated as a batch; nothing is saved if any is invalid
- Field filter columns and card values sources are looked up on the platform; a missing one is reported with the available columns
- The query is run once first; a failing query is reported and nothing is saved
- Optional clauses go in [[ ... ]] so the query runs without a value

**Output:**
- card_id, name, parameters_count
- warnings: placeholder problems found in the query`;

export const UPDATE_CARD_DESCRIPTION = `Update selected fields of a card.

**Input:**
- card_id (required)
- name, query, parameters, description, collection_id, archived, display, visualization_settings

**Behavior:**
- parameters replaces the whole list; a descriptor without id keeps the id of the existing parameter with the same slug, so dashboard filters stay connected
- A new query is run once before saving

**Output:**
- card_id, updated_fields, parameters_count
- warnings: computed against the final query when parameters are given`;

export const UPDATE_DASHBOARD_PARAMETERS_DESCRIPTION = `Replace the filters of a dashboard and connect them to card parameters.

**Input:**
- dashboard_id (required)
- parameters: descriptor array; a descriptor without id keeps the id of the existing filter with the same name
- mappings (optional): [{ dashcard_id, dashboard_parameter_name, card_parameter_name }]

**Behavior:**
- Card values sources are looked up on the platform; the source card must have run and contain value_field and label_field
- Mappings are resolved by name, all or nothing; every failure is reported with the available names
- Mappings to removed filters are dropped

**Output:**
- dashboard_id, parameters (id, name, slug, type), mappings_count`;
