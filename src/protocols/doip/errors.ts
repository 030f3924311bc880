/**
 * Structured DoIP error taxonomy.
 * @module doip/errors
 */
import {DoipDiagnosticNackCode, DoipGenericNackCode, DoipRoutingActivationCode} from './constants';

export type DoipErrorDomain = 'frame' | 'transport' | 'routing' | 'discovery' | 'timeout';

export type DoipErrorCode =
    | 'MALFORMED_FRAME'
    | 'UNSUPPORTED_PAYLOAD_TYPE'
    | 'TIMEOUT'
    | 'LINK_DOWN'
    | 'ROUTING_ACTIVATION_DENIED'
    | 'DIAGNOSTIC_MESSAGE_NACK'
    | 'GENERIC_NACK'
    | 'PROTOCOL_ERROR';

export class DoipError extends Error {
    public readonly domain: DoipErrorDomain;
    public readonly code: DoipErrorCode;
    /** Protocol status byte that caused the error (routing activation code, NACK code). */
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: DoipErrorDomain;
        code: DoipErrorCode;
        statusCode?: number;
        details?: Record<string, unknown>;
    }) {
        super(params.message);
        this.name = 'DoipError';
        this.domain = params.domain;
        this.code = params.code;
        this.statusCode = params.statusCode;
        this.details = params.details;
    }
}

/** Narrowing helper for `catch` blocks. */
export const isDoipError = (err: unknown, code?: DoipErrorCode): err is DoipError =>
    err instanceof DoipError && (code === undefined || err.code === code);

export const doipTimeout = (message: string, details?: Record<string, unknown>): DoipError => new DoipError({
    message,
    domain: 'timeout',
    code: 'TIMEOUT',
    details,
});

export const doipLinkDown = (message: string, details?: Record<string, unknown>): DoipError => new DoipError({
    message,
    domain: 'transport',
    code: 'LINK_DOWN',
    details,
});

const ROUTING_ACTIVATION_MESSAGES = new Map<number, string>([
    [DoipRoutingActivationCode.UnknownSourceAddress, 'Routing activation denied: unknown source address'],
    [DoipRoutingActivationCode.NoMoreRoutingSlotsAvailable, 'Routing activation denied: all TCP sockets are registered and active'],
    [DoipRoutingActivationCode.InvalidAddressOrRoutingType, 'Routing activation denied: source address differs from the one registered on this socket'],
    [DoipRoutingActivationCode.SourceAddressAlreadyRegistered, 'Routing activation denied: source address already registered on another socket'],
    [DoipRoutingActivationCode.Unauthorized, 'Routing activation denied: missing authentication'],
    [DoipRoutingActivationCode.MissingConfirmation, 'Routing activation denied: rejected confirmation'],
    [DoipRoutingActivationCode.InvalidRoutingType, 'Routing activation denied: unsupported routing activation type'],
    [DoipRoutingActivationCode.SecuredConnectionRequired, 'Routing activation denied: secured connection (TLS) required'],
    [DoipRoutingActivationCode.VehicleNotReadyForRouting, 'Routing activation denied: vehicle not ready for routing'],
    [DoipRoutingActivationCode.Success, 'Routing activation succeeded'],
    [DoipRoutingActivationCode.ConfirmationRequired, 'Routing activation pending: confirmation required'],
]);

/**
 * Build the error raised for a routing activation response other than success.
 */
export const mapRoutingActivationCodeToError = (
    code: number,
    details?: Record<string, unknown>,
): DoipError => {
    const message = ROUTING_ACTIVATION_MESSAGES.get(code)
        ?? `Routing activation denied with unknown code 0x${code.toString(16).padStart(2, '0')}`;
    return new DoipError({
        message,
        domain: 'routing',
        code: 'ROUTING_ACTIVATION_DENIED',
        statusCode: code,
        details,
    });
};

const hexByte = (value: number): string => `0x${value.toString(16).padStart(2, '0').toUpperCase()}`;

/** Error for a diagnostic message NACK (payload type 0x8003). */
export const diagnosticNackError = (code: number, details?: Record<string, unknown>): DoipError => {
    const name = DoipDiagnosticNackCode[code] ?? 'Unknown';
    return new DoipError({
        message: `Diagnostic message rejected by entity: ${name} (${hexByte(code)})`,
        domain: 'transport',
        code: 'DIAGNOSTIC_MESSAGE_NACK',
        statusCode: code,
        details,
    });
};

/** Error for a generic header NACK (payload type 0x0000). */
export const genericNackError = (code: number, details?: Record<string, unknown>): DoipError => {
    const name = DoipGenericNackCode[code] ?? 'Unknown';
    return new DoipError({
        message: `DoIP header rejected by entity: ${name} (${hexByte(code)})`,
        domain: 'frame',
        code: 'GENERIC_NACK',
        statusCode: code,
        details,
    });
};
