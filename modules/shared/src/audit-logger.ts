/**
 * SSO Login - Audit Logger
 *
 * Structured JSON logging to CloudWatch.
 *
 * - Logger: operational messages with a request id (DEBUG..ERROR)
 * - AuditLogger: one AUDIT entry per security-relevant login event
 *
 * Passwords never reach either logger.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type { AuthMethod, AuthStage } from './constants';

// =============================================================================
// Audit Types
// =============================================================================

export type AuditAction = 'LOGIN_SUCCESS' | 'LOGIN_FAILURE' | 'AUTH_STATE_SAVED';

export type AuditActor =
    | { type: 'USER'; username: string; authSourceId: string }
    | { type: 'ANONYMOUS' };

export interface AuditLogEntry {
    level: 'AUDIT';
    timestamp: string;
    requestId: string;
    action: AuditAction;
    ip: string;
    actor: AuditActor;
    details: Record<string, unknown>;
}

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    /** User agent string */
    userAgent?: string;
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

/**
 * AuditLogger writes one JSON line per audit event.
 * All output goes to console (which Lambda routes to CloudWatch).
 */
export class AuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    log(action: AuditAction, actor: AuditActor, details: Record<string, unknown>): void {
        const entry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: this.context.requestId,
            action,
            ip: this.context.ip,
            actor,
            details,
        };

        console.log(JSON.stringify(entry));
    }

    // ---------------------------------------------------------------------------
    // Convenience Methods
    // ---------------------------------------------------------------------------

    loginSuccess(
        actor: { username: string; authSourceId: string },
        details: { method: AuthMethod; organization?: string; rememberMe: boolean }
    ): void {
        this.log('LOGIN_SUCCESS', { type: 'USER', ...actor }, details);
    }

    /**
     * Log a failed verification. `reason` is the backend's error code.
     */
    loginFailure(details: {
        method: AuthMethod;
        authSourceId: string;
        username: string;
        organization?: string;
        reason: string;
    }): void {
        this.log('LOGIN_FAILURE', { type: 'ANONYMOUS' }, details);
    }

    /**
     * Log that a login attempt produced a successor state.
     */
    stateSaved(details: {
        stage: AuthStage;
        previousStateId: string;
        stateId: string;
        reason: 'remember_me' | 'login_failed' | 'authenticated';
    }): void {
        this.log('AUTH_STATE_SAVED', { type: 'ANONYMOUS' }, details);
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    // Extract IP from HTTP API v2 format (headers are lowercase)
    const forwardedFor = event.headers?.['x-forwarded-for'];
    const ip = forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';

    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    return new AuditLogger({
        requestId,
        ip,
        userAgent: event.headers?.['user-agent'],
    });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

/**
 * Create a Logger from API Gateway HTTP API v2 event context.
 */
export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        'unknown';

    return new Logger(requestId);
}
