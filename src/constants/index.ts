/**
 * constants/index.ts
 * Central export for constants
 */

export { API_ENDPOINTS, type BackendEndpoint } from './api-endpoints.js';
export { ERROR_MESSAGES, type ErrorMessageKey } from './error-messages.js';
