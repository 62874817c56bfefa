/**
 * User-facing error messages shared by the HTTP layer.
 */

export const BACKEND_ERROR_MESSAGE = 'Something went wrong on our side. Please try again later.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const TOO_MANY_REQUESTS_MESSAGE = 'Too many requests. Please slow down.';
