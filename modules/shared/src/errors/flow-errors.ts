/**
 * SSO Login - Flow Errors
 *
 * Two families of errors cross the login flow:
 *
 * - LoginFlowError and its subclasses are fatal. They end the request with a
 *   JSON error and are never displayed inline on the form.
 * - AuthenticationError is raised by a credential backend when verification
 *   fails. The controller catches it, attaches it to a fresh state and
 *   re-displays the form.
 */

import type { AuthStage } from '../constants';
import { HttpStatus, type HttpStatusCode } from './http-status';

// =============================================================================
// Fatal Flow Errors
// =============================================================================

export class LoginFlowError extends Error {
    /** HTTP status the handler answers with */
    readonly statusCode: HttpStatusCode;
    /** Error code for the JSON body (`error` field) */
    readonly error: 'invalid_request' | 'server_error';

    constructor(
        message: string,
        statusCode: HttpStatusCode,
        error: 'invalid_request' | 'server_error'
    ) {
        super(message);
        this.name = 'LoginFlowError';
        this.statusCode = statusCode;
        this.error = error;
    }
}

export class BadRequestError extends LoginFlowError {
    constructor(message: string) {
        super(message, HttpStatus.BAD_REQUEST, 'invalid_request');
        this.name = 'BadRequestError';
    }
}

/**
 * The state id is unknown, expired, or its record failed validation.
 */
export class NoStateError extends LoginFlowError {
    readonly stateId: string;

    constructor(stateId: string) {
        super('Invalid or expired state', HttpStatus.BAD_REQUEST, 'invalid_request');
        this.name = 'NoStateError';
        this.stateId = stateId;
    }
}

export class StageMismatchError extends LoginFlowError {
    readonly stateId: string;
    readonly actualStage: string;
    readonly expectedStage: AuthStage;

    constructor(stateId: string, actualStage: string, expectedStage: AuthStage) {
        super(
            `Wrong stage in state. Was '${actualStage}', should be '${expectedStage}'.`,
            HttpStatus.BAD_REQUEST,
            'invalid_request'
        );
        this.name = 'StageMismatchError';
        this.stateId = stateId;
        this.actualStage = actualStage;
        this.expectedStage = expectedStage;
    }
}

/**
 * The backend named by a state is no longer configured (or is not a backend of
 * the expected variant). This is configuration drift, not a credential problem.
 */
export class UnknownAuthSourceError extends LoginFlowError {
    readonly authSourceId: string;

    constructor(authSourceId: string, detail = 'Could not find authentication source') {
        super(`${detail} with id ${authSourceId}`, HttpStatus.INTERNAL_SERVER_ERROR, 'server_error');
        this.name = 'UnknownAuthSourceError';
        this.authSourceId = authSourceId;
    }
}

// =============================================================================
// Recoverable Credential Errors
// =============================================================================

export class AuthenticationError extends Error {
    /** Opaque code, looked up in the error code catalog */
    readonly code: string;
    /** Display parameters for the code's description */
    readonly params: Record<string, string>;

    constructor(code: string, params: Record<string, string> = {}) {
        super(`Authentication failed: ${code}`);
        this.name = 'AuthenticationError';
        this.code = code;
        this.params = params;
    }
}
