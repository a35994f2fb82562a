/**
 * Request fields populated by Tasklane middleware.
 */
declare global {
    namespace Express {
        interface Request {
            /** Correlation id set by requestContext */
            id?: string;
        }
    }
}

export {};
