/**
 * Error taxonomy. Each class carries the HTTP status the API answers with;
 * anything else reaching the error handler is treated as a storage or
 * programming failure (500) for that request only.
 */

export class AppError extends Error {
    constructor(message: string, public statusCode: number = 500) {
        super(message);
        this.name = 'AppError';
        Error.captureStackTrace(this, this.constructor);
    }
}

/** Bad input or a malformed backup archive. Nothing was changed. */
export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}

/** A list with the same name (ignoring case) already exists. */
export class DuplicateNameError extends AppError {
    constructor(public listName: string) {
        super(`A list named "${listName}" already exists`, 409);
        this.name = 'DuplicateNameError';
    }
}

/** An external lookup needed to finish the operation returned nothing usable. */
export class LookupFailure extends AppError {
    constructor(message: string) {
        super(message, 502);
        this.name = 'LookupFailure';
    }
}
