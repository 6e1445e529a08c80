export { ErrorHandler, ErrorSeverity, type ErrorContext, type ErrorInfo } from './ErrorHandler.js';
export { FileSystemHelper } from './FileSystemHelper.js';
export { JsonValidator, Validators, findInvalidKey, type Shape, type Validator } from './JsonValidator.js';
