/**
 * SSO Login - Form Body Parser
 *
 * Parses URL-encoded form data from POST requests.
 */

/**
 * Parse a URL-encoded form body. Handles base64-encoded bodies from API Gateway.
 * A repeated field keeps its last value.
 */
export function parseFormBody(
    body: string | null | undefined,
    isBase64Encoded: boolean
): Map<string, string> {
    const fields = new Map<string, string>();
    if (!body) {
        return fields;
    }

    const decodedBody = isBase64Encoded
        ? Buffer.from(body, 'base64').toString('utf-8')
        : body;

    for (const [key, value] of new URLSearchParams(decodedBody)) {
        fields.set(key, value);
    }

    return fields;
}
