/**
 * MCP Server Factory
 *
 * Creates and configures the MCP server with all parameter tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { err, ok, type Result } from 'neverthrow';

import {
  CREATE_CARD_DESCRIPTION,
  GET_CARD_PARAMETERS_DOCUMENTATION_DESCRIPTION,
  GET_DASHBOARD_PARAMETERS_DOCUMENTATION_DESCRIPTION,
  UPDATE_CARD_DESCRIPTION,
  UPDATE_DASHBOARD_PARAMETERS_DESCRIPTION,
  VALIDATE_CARD_PARAMETERS_DESCRIPTION,
  VALIDATE_DASHBOARD_PARAMETERS_DESCRIPTION,
} from './tool-descriptions.js';
import { MCP_ERROR_CODES, internalError, type McpError } from '../../core/errors.js';
import {
  CreateCardInputZod,
  GetParametersDocumentationInputZod,
  UpdateCardInputZod,
  UpdateDashboardParametersInputZod,
  ValidateCardParametersInputZod,
  ValidateDashboardParametersInputZod,
} from '../../core/schemas/zod-schemas.js';
import { createCard } from '../../core/usecases/create-card.js';
import {
  getCardParametersDocumentation,
  getDashboardParametersDocumentation,
} from '../../core/usecases/get-parameters-documentation.js';
import { updateCard } from '../../core/usecases/update-card.js';
import { updateDashboardParameters } from '../../core/usecases/update-dashboard-parameters.js';
import {
  validateCardParameters,
  validateDashboardParameters,
} from '../../core/usecases/validate-parameters.js';
import { serializeWithLimit } from '../../core/utils.js';

import type { McpConfig, PlatformDeps } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies required to create the MCP server.
 */
export interface CreateMcpServerDeps extends PlatformDeps {
  config: McpConfig;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Server Instructions
// ─────────────────────────────────────────────────────────────────────────────

const SERVER_INSTRUCTIONS = `
# Metabase Parameter Bridge

Creates native SQL cards with filter parameters and configures dashboard filters.
Parameters are written as short descriptors; the server expands them into the
template tags and parameter objects Metabase stores.

## Recommended Workflow

1. get_card_parameters_documentation / get_dashboard_parameters_documentation
2. validate_card_parameters with the query, fix errors and warnings
3. create_card or update_card
4. update_dashboard_parameters with mappings to connect dashboard filters to card parameters

## Placeholders

- {{name}} in the query refers to the parameter named name
- Wrap optional conditions in [[ ... ]]
- Field filters expand to a whole condition: WHERE {{status}}, never status = {{status}}
- Never quote a placeholder
`;

// ─────────────────────────────────────────────────────────────────────────────
// Tool Response Helpers
// ─────────────────────────────────────────────────────────────────────────────

const textResponse = (text: string) => ({
  content: [{ type: 'text' as const, text }],
});

/** Builds an error MCP tool response */
const errResponse = (error: McpError) => {
  const errorObj = {
    ok: false,
    code: error.code,
    error: error.message,
    ...(error.code === MCP_ERROR_CODES.INVALID_PARAMETERS && { valid: false }),
    ...(error.details !== undefined && { errors: error.details }),
    ...(error.hint !== undefined && { hint: error.hint }),
  };
  return { ...textResponse(JSON.stringify(errorObj)), isError: true as const };
};

// ─────────────────────────────────────────────────────────────────────────────
// Server Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a configured MCP server with all tools registered.
 */
export function createMcpServer(deps: CreateMcpServerDeps): McpServer {
  const { platform, ids, config } = deps;
  const log = deps.logger.child({ component: 'McpServer' });

  const server = new McpServer(
    {
      name: 'Metabase Parameter Bridge',
      version: '1.0.0',
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        tools: {},
      },
    }
  );

  /** Runs a use case, logs the outcome and enforces the response size limit */
  const respond = async <T>(
    tool: string,
    run: () => Result<T, McpError> | Promise<Result<T, McpError>>
  ) => {
    log.info({ tool }, 'Tool called');

    let result: Result<T, McpError>;
    try {
      result = await run();
    } catch (error) {
      log.error({ tool, err: error }, 'Tool failed unexpectedly');
      result = err(internalError());
    }

    const serialized = result.andThen((value) =>
      serializeWithLimit(value, config.responseSizeLimit)
    );
    if (serialized.isErr()) {
      const { error } = serialized;
      log.info(
        { tool, code: error.code, errorCount: error.details?.length ?? 0 },
        'Tool returned an error'
      );
      return errResponse(error);
    }
    return textResponse(serialized.value);
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools
  // ─────────────────────────────────────────────────────────────────────────

  // get_card_parameters_documentation
  server.registerTool(
    'get_card_parameters_documentation',
    {
      description: GET_CARD_PARAMETERS_DOCUMENTATION_DESCRIPTION,
      inputSchema: GetParametersDocumentationInputZod.shape,
    },
    () =>
      respond('get_card_parameters_documentation', () => ok(getCardParametersDocumentation()))
  );

  // get_dashboard_parameters_documentation
  server.registerTool(
    'get_dashboard_parameters_documentation',
    {
      description: GET_DASHBOARD_PARAMETERS_DOCUMENTATION_DESCRIPTION,
      inputSchema: GetParametersDocumentationInputZod.shape,
    },
    () =>
      respond('get_dashboard_parameters_documentation', () =>
        ok(getDashboardParametersDocumentation())
      )
  );

  // validate_card_parameters
  server.registerTool(
    'validate_card_parameters',
    {
      description: VALIDATE_CARD_PARAMETERS_DESCRIPTION,
      inputSchema: ValidateCardParametersInputZod.shape,
    },
    (args) => respond('validate_card_parameters', () => validateCardParameters({ ids }, args))
  );

  // validate_dashboard_parameters
  server.registerTool(
    'validate_dashboard_parameters',
    {
      description: VALIDATE_DASHBOARD_PARAMETERS_DESCRIPTION,
      inputSchema: ValidateDashboardParametersInputZod.shape,
    },
    (args) =>
      respond('validate_dashboard_parameters', () => validateDashboardParameters({ ids }, args))
  );

  // create_card
  server.registerTool(
    'create_card',
    {
      description: CREATE_CARD_DESCRIPTION,
      inputSchema: CreateCardInputZod.shape,
    },
    (args) => respond('create_card', () => createCard({ platform, ids }, args))
  );

  // update_card
  server.registerTool(
    'update_card',
    {
      description: UPDATE_CARD_DESCRIPTION,
      inputSchema: UpdateCardInputZod.shape,
    },
    (args) => respond('update_card', () => updateCard({ platform, ids }, args))
  );

  // update_dashboard_parameters
  server.registerTool(
    'update_dashboard_parameters',
    {
      description: UPDATE_DASHBOARD_PARAMETERS_DESCRIPTION,
      inputSchema: UpdateDashboardParametersInputZod.shape,
    },
    (args) =>
      respond('update_dashboard_parameters', () =>
        updateDashboardParameters({ platform, ids }, args)
      )
  );

  return server;
}

/**
 * Creates and runs the MCP server with stdio transport.
 * This is used for running the server as a standalone process.
 */
export async function runMcpServerStdio(deps: CreateMcpServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
