/**
 * SSO Login - Error Code Catalog
 *
 * Static catalog of the error codes a credential backend may raise.
 * The login flow treats codes as opaque; the catalog is shipped to the view so
 * the form can look up the title and description of any code.
 *
 * Descriptions may reference error parameters as `{name}` placeholders.
 */

export interface ErrorCodeMessage {
    title: string;
    description: string;
}

export const ErrorCodes = {
    WRONGUSERPASS: {
        title: 'Incorrect username or password',
        description: 'Either no user with the given username could be found, or the password you gave was wrong. Please check the username and try again.',
    },
    ACCOUNTLOCKED: {
        title: 'Account locked',
        description: 'Your account has been temporarily locked after too many failed attempts. Please try again later.',
    },
    ACCOUNTINACTIVE: {
        title: 'Account not active',
        description: 'Your account is not active. Please contact support.',
    },
    NOACCESS: {
        title: 'No access',
        description: 'You do not have access to this service.',
    },
    AUTHSOURCEERROR: {
        title: 'Authentication source error',
        description: 'The authentication source {authsource} reported an error: {reason}',
    },
    BACKENDERROR: {
        title: 'Directory error',
        description: 'The user directory could not be reached while verifying your credentials. Please try again later.',
    },
    BADREQUEST: {
        title: 'Bad request',
        description: 'The request to the login page was malformed: {reason}',
    },
    CONFIG: {
        title: 'Configuration error',
        description: 'The login service is misconfigured.',
    },
    NOSTATE: {
        title: 'State information lost',
        description: 'The state of your login attempt was lost or has expired. Please start the login again from the service you were accessing.',
    },
    NOTFOUND: {
        title: 'Page not found',
        description: 'The given page was not found.',
    },
    STATESTOREERROR: {
        title: 'Session storage unavailable',
        description: 'Login state could not be stored. Please try again in a moment.',
    },
    UNHANDLEDEXCEPTION: {
        title: 'Unhandled exception',
        description: 'An unexpected error occurred while processing your login.',
    },
    USERABORTED: {
        title: 'Authentication aborted',
        description: 'The authentication was aborted by the user.',
    },
} as const satisfies Record<string, ErrorCodeMessage>;

export type KnownErrorCode = keyof typeof ErrorCodes;

export type ErrorCodeCatalog = Readonly<Record<string, ErrorCodeMessage>>;

/**
 * Every known error code with its messages.
 */
export function getAllErrorCodeMessages(): ErrorCodeCatalog {
    return ErrorCodes;
}

/**
 * Look up the messages for a code, substituting `{name}` parameters in the
 * description. Unknown codes render the code itself as the title.
 */
export function getErrorCodeMessage(
    code: string,
    params: Readonly<Record<string, string>> = {}
): ErrorCodeMessage {
    const catalog: ErrorCodeCatalog = ErrorCodes;
    if (!Object.hasOwn(catalog, code)) {
        return { title: code, description: '' };
    }
    const entry = catalog[code];

    const description = entry.description.replace(/\{(\w+)\}/g, (match, name: string) =>
        Object.hasOwn(params, name) ? params[name] : match
    );

    return { title: entry.title, description };
}
