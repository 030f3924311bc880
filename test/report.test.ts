import {describe, expect, it} from 'vitest';

import {
    DoipError,
    UdsError,
    decodeUdsResponse,
    formatDiagnosticError,
    mapRoutingActivationCodeToError,
    negativeResponseError,
} from '../src';

const decodeFailure = (bytes: Buffer, expected: number): unknown => {
    try {
        decodeUdsResponse(bytes, expected);
    } catch (err) {
        return err;
    }
    throw new Error('expected decode to fail');
};

describe('formatDiagnosticError', () => {
    it('names the service and NRC of a negative response', () => {
        expect(formatDiagnosticError(negativeResponseError(0x2e, 0x31))).toBe(
            '[UDS NEGATIVE_RESPONSE] WriteDataByIdentifier (0x2E) rejected: RequestOutOfRange (NRC 0x31)',
        );
        expect(formatDiagnosticError(negativeResponseError(0x27, 0x35, 'SECURITY_ACCESS_DENIED'))).toBe(
            '[UDS SECURITY_ACCESS_DENIED] SecurityAccess (0x27) rejected: InvalidKey (NRC 0x35)',
        );
    });

    it('includes the raw bytes of decode failures', () => {
        expect(formatDiagnosticError(decodeFailure(Buffer.from([0x7e, 0x00]), 0x22))).toBe(
            '[UDS SERVICE_MISMATCH] UDS response for TesterPresent (0x3E) does not answer ReadDataByIdentifier (0x22) (payload: 7E 00)',
        );
    });

    it('shows the status byte of DoIP errors', () => {
        expect(formatDiagnosticError(mapRoutingActivationCodeToError(0x07))).toBe(
            '[DoIP ROUTING_ACTIVATION_DENIED] Routing activation denied: secured connection (TLS) required (status 0x07)',
        );
        expect(formatDiagnosticError(new DoipError({message: 'DoIP connection closed', domain: 'transport', code: 'LINK_DOWN'}))).toBe(
            '[DoIP LINK_DOWN] DoIP connection closed',
        );
    });

    it('falls back to the error name or plain value', () => {
        expect(formatDiagnosticError(new UdsError({message: 'No response to EcuReset within 2000ms', domain: 'timeout', code: 'TIMEOUT'}))).toBe(
            '[UDS TIMEOUT] No response to EcuReset within 2000ms',
        );
        expect(formatDiagnosticError(new RangeError('bad value'))).toBe('[RangeError] bad value');
        expect(formatDiagnosticError('plain')).toBe('plain');
    });
});
