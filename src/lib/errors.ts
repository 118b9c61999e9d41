/**
 * Errors raised before any work starts (bad input, missing files). Anything
 * else reaching a route handler is reported as a 500.
 */
export class VerificationError extends Error {
    constructor(message: string, readonly status: number) {
        super(message);
        this.name = new.target.name;
    }
}

export class InputError extends VerificationError {
    constructor(message: string) {
        super(message, 400);
    }
}

export class NotFoundError extends VerificationError {
    constructor(message: string) {
        super(message, 404);
    }
}

export class PayloadTooLargeError extends VerificationError {
    constructor(message: string) {
        super(message, 413);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
