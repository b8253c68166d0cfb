import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';

import { AuthorizationDenied, ConfigurationError } from '../guard/index.js';

export type HandledError = FastifyError | AuthorizationDenied | ConfigurationError;

type ErrorPayload = {
    error: string;
    code: string;
    message?: string;
    remediation: string;
    meta?: Record<string, unknown>;
    context: Record<string, unknown>;
};

function statusCodeOf(error: HandledError): number {
    if (error instanceof AuthorizationDenied) {
        return 403;
    }
    if (error instanceof ConfigurationError) {
        return 500;
    }

    return error.statusCode || 500;
}

export function errorHandler(error: HandledError, request: FastifyRequest, reply: FastifyReply) {
    const statusCode = statusCodeOf(error);

    if (error instanceof AuthorizationDenied) {
        request.log.warn({ target: error.target, path: error.path }, error.message);
        reply.status(statusCode).send({
            error: error.message,
            code: error.code,
            remediation: 'The current credentials may not access this field. Remove it from the query or use an authorized API key.',
            context: {
                requestId: request.id
            }
        } satisfies ErrorPayload);
        return;
    }

    request.log.error(error);

    let remediation = 'Check the request parameters and try again.';
    let meta: Record<string, unknown> | undefined;
    const validation = error instanceof ConfigurationError ? undefined : error.validation;

    if (validation) {
        remediation = 'Send a JSON body with a string `query` and optional `variables` object and `operationName` string.';
        meta = {
            recommendedNextAction: 'Correct the payload and retry',
            actionPriority: 'high'
        };
    } else if (statusCode === 400) {
        remediation = 'The request payload was invalid. Correct the structure and try again.';
    } else if (statusCode === 404) {
        remediation = 'The requested resource was not found. Verify the URL path.';
    } else if (statusCode === 500) {
        remediation = 'An internal server error occurred. This may be a bug. Retry the request later or contact support.';
    }

    const payload: ErrorPayload = {
        error: validation ? 'Bad Request' : (error.message || 'Unknown Error'),
        code: validation ? 'VALIDATION_ERROR' : (error.code || 'INTERNAL_SERVER_ERROR'),
        message: validation ? error.message : undefined,
        remediation,
        meta,
        context: {
            ...(validation ? { validation } : {}),
            requestId: request.id
        }
    };

    reply.status(statusCode).send(payload);
}
