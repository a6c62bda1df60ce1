/**
 * MCP Module - Core Types
 */

import type { IdentifierGenerator, QueryWarning } from '../../parameters/index.js';
import type { PlatformClient } from '../../platform/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface McpConfig {
  /** Longest serialized tool response, in characters */
  readonly responseSizeLimit: number;
}

export const DEFAULT_MCP_CONFIG: McpConfig = {
  responseSizeLimit: 100_000,
};

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

/** Shared by every use case that talks to the platform */
export interface PlatformDeps {
  readonly platform: PlatformClient;
  readonly ids: IdentifierGenerator;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tool Outputs
// ─────────────────────────────────────────────────────────────────────────────

export interface ValidationReport {
  readonly valid: boolean;
  readonly parameters_count: number;
  readonly errors: readonly string[];
  readonly warnings: readonly QueryWarning[];
}

export interface CreateCardOutput {
  readonly card_id: number;
  readonly name: string;
  readonly parameters_count: number;
  readonly warnings: readonly QueryWarning[];
}

export interface UpdateCardOutput {
  readonly card_id: number;
  readonly updated_fields: readonly string[];
  readonly parameters_count: number;
  readonly warnings: readonly QueryWarning[];
}

export interface DashboardParameterSummary {
  readonly id: string;
  readonly name: string;
  readonly slug: string;
  readonly type: string;
}

export interface UpdateDashboardParametersOutput {
  readonly dashboard_id: number;
  readonly parameters: readonly DashboardParameterSummary[];
  readonly mappings_count: number;
}
