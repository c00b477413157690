export { McpError, formatError, invalidParams, notFound } from './errors.js';
export type { ErrorCode } from './errors.js';
