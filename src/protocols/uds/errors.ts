/**
 * Structured UDS error taxonomy.
 * @module uds/errors
 */
import {describeNegativeResponse} from './constants';

export type UdsErrorDomain = 'response' | 'decode' | 'session' | 'security' | 'codec' | 'timeout' | 'transport';

export type UdsErrorCode =
    | 'NEGATIVE_RESPONSE'
    | 'TRUNCATED_RESPONSE'
    | 'SERVICE_MISMATCH'
    | 'IDENTIFIER_MISMATCH'
    | 'EXCHANGE_IN_PROGRESS'
    | 'RESPONSE_PENDING_EXCEEDED'
    | 'SECURITY_ACCESS_DENIED'
    | 'UNKNOWN_IDENTIFIER_CODEC'
    | 'TIMEOUT'
    | 'LINK_DOWN';

export class UdsError extends Error {
    public readonly domain: UdsErrorDomain;
    public readonly code: UdsErrorCode;
    /** Request service id the error relates to, when known. */
    public readonly serviceId?: number;
    /** Negative response code for `NEGATIVE_RESPONSE` and `SECURITY_ACCESS_DENIED`. */
    public readonly responseCode?: number;
    /** Raw response bytes for decode failures, or the record no codec could interpret. */
    public readonly payload?: Buffer;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: UdsErrorDomain;
        code: UdsErrorCode;
        serviceId?: number;
        responseCode?: number;
        payload?: Buffer;
        details?: Record<string, unknown>;
    }) {
        super(params.message);
        this.name = 'UdsError';
        this.domain = params.domain;
        this.code = params.code;
        this.serviceId = params.serviceId;
        this.responseCode = params.responseCode;
        this.payload = params.payload;
        this.details = params.details;
    }
}

export const isUdsError = (err: unknown, code?: UdsErrorCode): err is UdsError =>
    err instanceof UdsError && (code === undefined || err.code === code);

export const negativeResponseError = (
    serviceId: number,
    responseCode: number,
    code: 'NEGATIVE_RESPONSE' | 'SECURITY_ACCESS_DENIED' = 'NEGATIVE_RESPONSE',
): UdsError => new UdsError({
    message: describeNegativeResponse(serviceId, responseCode),
    domain: code === 'SECURITY_ACCESS_DENIED' ? 'security' : 'response',
    code,
    serviceId,
    responseCode,
});
