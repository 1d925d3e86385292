/**
 * error-messages.ts
 * Standardized error messages used across the codebase
 */

export const ERROR_MESSAGES = {
  // Terminal generation outcomes
  NO_SERVERS_AVAILABLE: 'No servers available',
  ALL_TIERS_FAILED: 'All generation methods failed',

  // Selection
  NO_HEALTHY_PAIR: (modelType: string) =>
    `No healthy prefill/decode pair for model type '${modelType}'`,
  NO_HEALTHY_DECODE: (modelType: string) =>
    `No healthy decode server for model type '${modelType}'`,

  // Backend payloads
  MISSING_CONTEXT: 'Prefill response carried no context payload',
  INVALID_TENSOR_CACHE: 'Tensor-cache context must be a non-empty base64 string',
  INVALID_TEXT_CONTEXT: 'Text-priming context must be a string',

  // Configuration
  DUPLICATE_SERVER_ID: (id: string) => `Server '${id}' is configured more than once`,

  // Generic errors
  INTERNAL_SERVER_ERROR: 'Internal server error',
  VALIDATION_FAILED: 'Validation failed',
  REQUEST_REJECTED: 'Request rejected',
  NOT_FOUND: 'Not found',
} as const;

export type ErrorMessageKey = keyof typeof ERROR_MESSAGES;
