/**
 * SSO Login - Errors
 *
 * @module errors
 */

export { HttpStatus } from './http-status';
export type { HttpStatusCode } from './http-status';

export {
    ErrorCodes,
    getAllErrorCodeMessages,
    getErrorCodeMessage,
} from './error-codes';
export type { ErrorCodeMessage, ErrorCodeCatalog, KnownErrorCode } from './error-codes';

export {
    LoginFlowError,
    BadRequestError,
    NoStateError,
    StageMismatchError,
    UnknownAuthSourceError,
    AuthenticationError,
} from './flow-errors';
