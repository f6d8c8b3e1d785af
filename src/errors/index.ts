export * from './knowledge-error.js';
export {
  ErrorHandler,
  type StructuredError,
  type ToolResponse,
} from './error-handler.js';
