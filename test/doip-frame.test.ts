import {describe, expect, it} from 'vitest';

import {
    DoipError,
    DoipPayloadType,
    decodeDoipFrame,
    encodeDoipFrame,
    extractDoipFrames,
} from '../src';

const hex = (value: string): Buffer => Buffer.from(value.replace(/\s+/g, ''), 'hex');

const thrown = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected function to throw');
};

describe('DoIP generic header', () => {
    it('encodes header and payload big-endian', () => {
        const frame = encodeDoipFrame(DoipPayloadType.DiagnosticMessage, hex('0e00 1001 22f190'));
        expect(frame).toEqual(hex('02 fd 8001 00000007 0e00 1001 22f190'));
    });

    it('decodes the fields of a frame', () => {
        const frame = decodeDoipFrame(hex('02 fd 0006 00000009 0e00 1001 10 00000000'));
        expect(frame.protocolVersion).toBe(0x02);
        expect(frame.inverseVersion).toBe(0xfd);
        expect(frame.payloadType).toBe(DoipPayloadType.RoutingActivationResponse);
        expect(frame.payloadLength).toBe(9);
        expect(frame.payload).toEqual(hex('0e00 1001 10 00000000'));
    });

    it('accepts the default version 0xFF used in vehicle identification requests', () => {
        const frame = decodeDoipFrame(hex('ff 00 0001 00000000'));
        expect(frame.protocolVersion).toBe(0xff);
        expect(frame.payload.length).toBe(0);
    });

    it('rejects frames shorter than the header', () => {
        expect(() => decodeDoipFrame(hex('02 fd 0001'))).toThrow(
            'DoIP frame too short: expected at least 8 bytes, got 4',
        );
    });

    it('rejects a version byte that the inverse does not complement', () => {
        const caught = thrown(() => decodeDoipFrame(hex('02 fc 0001 00000000')));
        expect(caught).toBeInstanceOf(DoipError);
        expect(caught).toMatchObject({
            code: 'MALFORMED_FRAME',
            domain: 'frame',
            message: 'DoIP inverse protocol version 0xfc does not complement version 0x2',
        });
    });

    it('rejects unknown protocol versions', () => {
        expect(() => decodeDoipFrame(hex('05 fa 0001 00000000'))).toThrow('Unknown DoIP protocol version 0x5');
    });

    it('reports unknown payload types with the type as status code', () => {
        expect(thrown(() => decodeDoipFrame(hex('02 fd 1234 00000000')))).toMatchObject({
            code: 'UNSUPPORTED_PAYLOAD_TYPE',
            statusCode: 0x1234,
            message: 'Unsupported DoIP payload type Unknown (0x1234)',
        });
    });

    it('rejects a payload length that disagrees with the frame', () => {
        expect(thrown(() => decodeDoipFrame(hex('02 fd 8001 00000005 0e00 10')))).toMatchObject({
            code: 'MALFORMED_FRAME',
            message: 'DoIP payload length mismatch: header declares 5 bytes, frame carries 3',
        });
    });

    it('refuses to encode invalid versions or payload types', () => {
        const unknownType: number = 0x1234;
        expect(() => encodeDoipFrame(DoipPayloadType.AliveCheckRequest, Buffer.alloc(0), 0x100)).toThrow(RangeError);
        expect(() => encodeDoipFrame(unknownType)).toThrow('Cannot encode unknown DoIP payload type 0x1234');
    });
});

describe('extractDoipFrames', () => {
    it('splits a stream into frames and keeps the incomplete tail', () => {
        const stream = Buffer.concat([
            hex('02 fd 0007 00000000'),
            hex('02 fd 8001 00000005 1001 0e00 7e'),
            hex('02 fd 8001 00000008 1001'),
        ]);
        const {frames, rejected, remainder} = extractDoipFrames(stream);
        expect(frames.map((frame) => frame.payloadType)).toEqual([
            DoipPayloadType.AliveCheckRequest,
            DoipPayloadType.DiagnosticMessage,
        ]);
        expect(rejected).toEqual([]);
        expect(remainder).toEqual(hex('02 fd 8001 00000008 1001'));
    });

    it('waits for a complete header', () => {
        const {frames, remainder} = extractDoipFrames(hex('02 fd 80'));
        expect(frames).toEqual([]);
        expect(remainder).toEqual(hex('02 fd 80'));
    });

    it('skips frames of unknown payload types by their declared length', () => {
        const stream = Buffer.concat([hex('02 fd 9999 00000002 abcd'), hex('02 fd 0007 00000000')]);
        const {frames, rejected, remainder} = extractDoipFrames(stream);
        expect(frames).toHaveLength(1);
        expect(frames[0]?.payloadType).toBe(DoipPayloadType.AliveCheckRequest);
        expect(rejected).toHaveLength(1);
        expect(rejected[0]?.statusCode).toBe(0x9999);
        expect(remainder.length).toBe(0);
    });

    it('throws on a broken header pattern', () => {
        expect(thrown(() => extractDoipFrames(hex('02 02 0007 00000000')))).toMatchObject({
            code: 'MALFORMED_FRAME',
        });
    });

    it('throws when a declared payload exceeds the limit', () => {
        expect(() => extractDoipFrames(hex('02 fd 8001 00000064'), 10)).toThrow(
            'DoIP payload length 100 exceeds limit 10',
        );
    });
});
