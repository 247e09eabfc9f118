/**
 * Tool outcome to response mapping, shared by the HTTP and stdio transports
 */

import type { ErrorResponse } from '../api/types.js';
import type { ToolCallOutcome } from '../tools/types.js';

export interface ToolResponse {
  statusCode: number;
  body: unknown;
}

export function toToolResponse(outcome: ToolCallOutcome): ToolResponse {
  switch (outcome.status) {
    case 'ok':
      return { statusCode: 200, body: outcome.result };
    case 'not_found': {
      const body: ErrorResponse = { success: false, error: outcome.error };
      return { statusCode: 404, body };
    }
    case 'invalid_input': {
      const body: ErrorResponse = {
        success: false,
        error: 'Validation error',
        message: outcome.error,
        details: outcome.issues,
      };
      return { statusCode: 400, body };
    }
    case 'failed': {
      const body: ErrorResponse = {
        success: false,
        error: 'Tool execution failed',
        message: outcome.error,
      };
      return { statusCode: 500, body };
    }
  }
}
