import { z } from 'zod';
import type { ErrorCode, ErrorDetails, Result } from '../domain/types';
import { RegistryError } from '../domain/types';

// --- Shared UUID schemas ---
// Accept both dashed (550e8400-e29b-41d4-a716-446655440000) and dashless (550e8400e29b41d4a716446655440000) UUIDs.
// Always transform to dashless lowercase to match the DB storage format.
const UUID_REGEX = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;
export const uuidSchema = z.string().regex(UUID_REGEX, 'Invalid UUID').transform(v => v.replace(/-/g, '').toLowerCase());
export const optionalUuidSchema = z.string().regex(UUID_REGEX, 'Invalid UUID').optional().transform(v => v ? v.replace(/-/g, '').toLowerCase() : undefined);

export const TOOL_RESPONSE_VERSION = '1.0.0';

export type ToolErrorCode = ErrorCode | 'INTERNAL_ERROR';

// --- Standard response format ---
export interface ToolResponse {
  success: boolean;
  message: string;
  data?: unknown;
  error?: string;
  code?: ToolErrorCode;
  details?: ErrorDetails;
  metadata: {
    timestamp: string;
    version: string;
  };
}

export interface ToolContent {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

function metadata(): ToolResponse['metadata'] {
  return {
    timestamp: new Date().toISOString(),
    version: TOOL_RESPONSE_VERSION,
  };
}

export function createSuccessResponse(message: string, data?: unknown): ToolResponse {
  return {
    success: true,
    message,
    data,
    metadata: metadata(),
  };
}

export function createErrorResponse(
  message: string,
  error?: string,
  code?: ToolErrorCode,
  details?: ErrorDetails
): ToolResponse {
  return {
    success: false,
    message,
    error: error || message,
    code,
    details,
    metadata: metadata(),
  };
}

/** Turn a repo result into a response, optionally reshaping the data. */
export function fromResult<T>(result: Result<T>, message: string, shape?: (data: T) => unknown): ToolResponse {
  if (!result.success) {
    return createErrorResponse(result.error, result.error, result.code, result.details);
  }
  return createSuccessResponse(message, shape ? shape(result.data) : result.data);
}

/** Response for a throw that escaped the repos (bad input or a bug). */
export function fromThrown(error: unknown): ToolResponse {
  if (error instanceof RegistryError) {
    return createErrorResponse(error.message, error.message, error.code, error.details);
  }
  if (error instanceof z.ZodError) {
    const issue = error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return createErrorResponse(`Invalid parameters: ${where}${issue?.message ?? 'invalid input'}`, undefined, 'VALIDATION_ERROR');
  }
  return createErrorResponse(
    error instanceof Error ? error.message : 'Internal error',
    undefined,
    'INTERNAL_ERROR'
  );
}

export function missingParams(operation: string, names: readonly string[]): ToolResponse {
  return createErrorResponse(
    `Missing required parameters for ${operation}: ${names.join(', ')}`,
    undefined,
    'VALIDATION_ERROR'
  );
}

export function toToolContent(response: ToolResponse): ToolContent {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(response, null, 2),
    }],
  };
}
