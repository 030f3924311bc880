/**
 * Caller-facing rendering of diagnostic failures.
 * @module core/report
 */
import {isDoipError} from '../protocols/doip';
import {describeNegativeResponse, formatHex, isUdsError} from '../protocols/uds';

/**
 * One-line description of an error raised by this library.
 *
 * - negative responses: service name, NRC name and hex code
 * - decode failures and uninterpreted records: message plus the raw payload in hex
 * - DoIP errors: code and protocol status byte when present
 */
export const formatDiagnosticError = (error: unknown): string => {
    if (isUdsError(error)) {
        if (
            (error.code === 'NEGATIVE_RESPONSE' || error.code === 'SECURITY_ACCESS_DENIED')
            && error.serviceId !== undefined
            && error.responseCode !== undefined
        ) {
            return `[UDS ${error.code}] ${describeNegativeResponse(error.serviceId, error.responseCode)}`;
        }
        if (error.payload) {
            return `[UDS ${error.code}] ${error.message} (payload: ${formatHex(error.payload) || 'empty'})`;
        }
        return `[UDS ${error.code}] ${error.message}`;
    }
    if (isDoipError(error)) {
        const status = error.statusCode === undefined
            ? ''
            : ` (status 0x${error.statusCode.toString(16).padStart(2, '0').toUpperCase()})`;
        return `[DoIP ${error.code}] ${error.message}${status}`;
    }
    if (error instanceof Error) return `[${error.name}] ${error.message}`;
    return String(error);
};
