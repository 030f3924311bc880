/**
 * DoIP generic header framing.
 * @module doip/frame
 *
 * Header layout (8 bytes, big-endian):
 *   protocol version (1) | inverse protocol version (1) | payload type (2) | payload length (4)
 */
import {
    DOIP_DEFAULT_PROTOCOL_VERSION,
    DOIP_HEADER_SIZE,
    DOIP_KNOWN_PROTOCOL_VERSIONS,
    type DoipPayloadType,
    doipPayloadTypeName,
    isDoipPayloadType,
} from './constants';
import {DoipError} from './errors';

export type DoipFrame = {
    protocolVersion: number;
    inverseVersion: number;
    payloadType: DoipPayloadType;
    payloadLength: number;
    payload: Buffer;
};

const malformed = (message: string, details?: Record<string, unknown>): DoipError => new DoipError({
    message,
    domain: 'frame',
    code: 'MALFORMED_FRAME',
    details,
});

const checkVersionPair = (buffer: Buffer, offset: number): number => {
    const version = buffer.readUInt8(offset);
    const inverse = buffer.readUInt8(offset + 1);
    if ((version ^ 0xff) !== inverse) {
        throw malformed(
            `DoIP inverse protocol version 0x${inverse.toString(16)} does not complement version 0x${version.toString(16)}`,
            {offset, version, inverse},
        );
    }
    if (!DOIP_KNOWN_PROTOCOL_VERSIONS.has(version)) {
        throw malformed(`Unknown DoIP protocol version 0x${version.toString(16)}`, {offset, version});
    }
    return version;
};

/**
 * Build one DoIP frame (generic header + payload).
 */
export const encodeDoipFrame = (
    payloadType: DoipPayloadType,
    payload: Buffer | Uint8Array = Buffer.alloc(0),
    protocolVersion: number = DOIP_DEFAULT_PROTOCOL_VERSION,
): Buffer => {
    if (!Number.isInteger(protocolVersion) || protocolVersion < 0 || protocolVersion > 0xff) {
        throw new RangeError(`DoIP protocol version must be 0-255, got ${protocolVersion}`);
    }
    if (!isDoipPayloadType(payloadType)) {
        throw new RangeError(`Cannot encode unknown DoIP payload type 0x${Number(payloadType).toString(16)}`);
    }
    const body = Buffer.from(payload);
    const frame = Buffer.alloc(DOIP_HEADER_SIZE + body.length);
    frame.writeUInt8(protocolVersion, 0);
    frame.writeUInt8(protocolVersion ^ 0xff, 1);
    frame.writeUInt16BE(payloadType, 2);
    frame.writeUInt32BE(body.length, 4);
    body.copy(frame, DOIP_HEADER_SIZE);
    return frame;
};

/**
 * Parse exactly one DoIP frame.
 *
 * Throws `DoipError(MALFORMED_FRAME)` on a broken version pair or a length
 * mismatch and `DoipError(UNSUPPORTED_PAYLOAD_TYPE)` on unknown payload types.
 */
export const decodeDoipFrame = (buffer: Buffer): DoipFrame => {
    if (buffer.length < DOIP_HEADER_SIZE) {
        throw malformed(`DoIP frame too short: expected at least ${DOIP_HEADER_SIZE} bytes, got ${buffer.length}`);
    }
    const protocolVersion = checkVersionPair(buffer, 0);
    const payloadType = buffer.readUInt16BE(2);
    if (!isDoipPayloadType(payloadType)) {
        throw new DoipError({
            message: `Unsupported DoIP payload type ${doipPayloadTypeName(payloadType)}`,
            domain: 'frame',
            code: 'UNSUPPORTED_PAYLOAD_TYPE',
            statusCode: payloadType,
        });
    }
    const payloadLength = buffer.readUInt32BE(4);
    const actual = buffer.length - DOIP_HEADER_SIZE;
    if (payloadLength !== actual) {
        throw malformed(
            `DoIP payload length mismatch: header declares ${payloadLength} bytes, frame carries ${actual}`,
            {payloadLength, actual},
        );
    }
    return {
        protocolVersion,
        inverseVersion: protocolVersion ^ 0xff,
        payloadType,
        payloadLength,
        payload: Buffer.from(buffer.subarray(DOIP_HEADER_SIZE)),
    };
};

export type ExtractedDoipFrames = {
    /** Whole frames decoded from the stream, in arrival order. */
    frames: DoipFrame[];
    /** Whole frames skipped because their payload type is not supported. */
    rejected: DoipError[];
    /** Trailing bytes of an incomplete frame. */
    remainder: Buffer;
};

/**
 * Extract all complete DoIP frames from a TCP stream buffer.
 *
 * A broken header pattern cannot be resynchronised and throws; frames of an
 * unknown payload type are skipped by their declared length.
 */
export const extractDoipFrames = (streamBuffer: Buffer, maxPayloadLength = Number.MAX_SAFE_INTEGER): ExtractedDoipFrames => {
    const frames: DoipFrame[] = [];
    const rejected: DoipError[] = [];
    let offset = 0;

    while (offset + DOIP_HEADER_SIZE <= streamBuffer.length) {
        checkVersionPair(streamBuffer, offset);
        const payloadLength = streamBuffer.readUInt32BE(offset + 4);
        if (payloadLength > maxPayloadLength) {
            throw malformed(`DoIP payload length ${payloadLength} exceeds limit ${maxPayloadLength}`, {offset});
        }
        const total = DOIP_HEADER_SIZE + payloadLength;
        if (offset + total > streamBuffer.length) break;

        try {
            frames.push(decodeDoipFrame(streamBuffer.subarray(offset, offset + total)));
        } catch (err) {
            if (!(err instanceof DoipError) || err.code !== 'UNSUPPORTED_PAYLOAD_TYPE') throw err;
            rejected.push(err);
        }
        offset += total;
    }

    return {
        frames,
        rejected,
        remainder: Buffer.from(streamBuffer.subarray(offset)),
    };
};
