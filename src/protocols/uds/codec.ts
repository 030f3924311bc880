/**
 * UDS request/response codec.
 * @module uds/codec
 *
 * Request:  SID | [sub-function] | data
 * Positive: SID + 0x40 | data
 * Negative: 0x7F | SID | NRC
 */
import {
    UDS_MAX_MESSAGE_LENGTH,
    UDS_MIN_POSITIVE_RESPONSE_LENGTH,
    UDS_NEGATIVE_RESPONSE_LENGTH,
    UDS_NEGATIVE_RESPONSE_SID,
    UDS_POSITIVE_RESPONSE_OFFSET,
    serviceName,
} from './constants';
import {UdsError} from './errors';

export type UdsRequest = {
    serviceId: number;
    subFunction?: number;
    data?: Buffer | Uint8Array;
};

export type UdsPositiveResponse = {
    kind: 'positive';
    serviceId: number;
    /** Bytes after the response SID (sub-function echo included). */
    data: Buffer;
};

export type UdsNegativeResponse = {
    kind: 'negative';
    serviceId: number;
    responseCode: number;
};

export type UdsResponse = UdsPositiveResponse | UdsNegativeResponse;

const assertByte = (value: number, label: string): number => {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
        throw new RangeError(`UDS ${label} must be 0-255, got ${value}`);
    }
    return value;
};

/** Space separated upper-case hex, e.g. `7F 2E 31`. */
export const formatHex = (bytes: Buffer): string => bytes.toString('hex').replace(/(..)(?!$)/g, '$1 ').toUpperCase();

/**
 * Serialize a request: service id, sub-function if present, data bytes.
 */
export const encodeUdsRequest = (request: UdsRequest): Buffer => {
    const header = request.subFunction === undefined
        ? [assertByte(request.serviceId, 'service id')]
        : [assertByte(request.serviceId, 'service id'), assertByte(request.subFunction, 'sub-function')];
    const data = request.data ?? Buffer.alloc(0);
    const length = header.length + data.length;
    if (length > UDS_MAX_MESSAGE_LENGTH) {
        throw new RangeError(`UDS request of ${length} bytes exceeds ${UDS_MAX_MESSAGE_LENGTH} bytes`);
    }
    return Buffer.concat([Buffer.from(header), Buffer.from(data)]);
};

const truncated = (bytes: Buffer, expected: number, serviceId?: number): UdsError => new UdsError({
    message: `Truncated UDS response: expected at least ${expected} bytes, got ${bytes.length} [${formatHex(bytes)}]`,
    domain: 'decode',
    code: 'TRUNCATED_RESPONSE',
    serviceId,
    payload: Buffer.from(bytes),
});

const sidLabel = (serviceId: number): string =>
    `${serviceName(serviceId)} (0x${serviceId.toString(16).padStart(2, '0').toUpperCase()})`;

const mismatch = (bytes: Buffer, actual: number, expected: number | undefined): UdsError => new UdsError({
    message: actual < 0
        ? `0x${bytes.readUInt8(0).toString(16).padStart(2, '0').toUpperCase()} is not a UDS response SID`
        : `UDS response for ${sidLabel(actual)} does not answer ${expected === undefined ? 'the request' : sidLabel(expected)}`,
    domain: 'decode',
    code: 'SERVICE_MISMATCH',
    serviceId: expected,
    payload: Buffer.from(bytes),
    details: {actualServiceId: actual},
});

/**
 * Parse a response. A leading 0x7F marks a negative response; anything
 * else must be the positive response SID of a request service.
 *
 * Throws `UdsError(TRUNCATED_RESPONSE)` when the bytes are shorter than the
 * detected shape needs and `UdsError(SERVICE_MISMATCH)` when they answer a
 * different service than `expectedServiceId`.
 */
export const decodeUdsResponse = (bytes: Buffer | Uint8Array, expectedServiceId?: number): UdsResponse => {
    const buffer = Buffer.from(bytes);
    if (buffer.length === 0) throw truncated(buffer, 1, expectedServiceId);

    if (buffer[0] === UDS_NEGATIVE_RESPONSE_SID) {
        if (buffer.length < UDS_NEGATIVE_RESPONSE_LENGTH) {
            throw truncated(buffer, UDS_NEGATIVE_RESPONSE_LENGTH, expectedServiceId);
        }
        const serviceId = buffer.readUInt8(1);
        if (expectedServiceId !== undefined && serviceId !== expectedServiceId) {
            throw mismatch(buffer, serviceId, expectedServiceId);
        }
        return {kind: 'negative', serviceId, responseCode: buffer.readUInt8(2)};
    }

    const serviceId = buffer.readUInt8(0) - UDS_POSITIVE_RESPONSE_OFFSET;
    if (serviceId < 0 || (expectedServiceId !== undefined && serviceId !== expectedServiceId)) {
        throw mismatch(buffer, serviceId, expectedServiceId);
    }
    const minLength = UDS_MIN_POSITIVE_RESPONSE_LENGTH.get(serviceId) ?? 1;
    if (buffer.length < minLength) throw truncated(buffer, minLength, serviceId);
    return {kind: 'positive', serviceId, data: Buffer.from(buffer.subarray(1))};
};

/** Encode a positive response (used by test doubles and loopback tooling). */
export const encodeUdsPositiveResponse = (serviceId: number, data: Buffer | Uint8Array = Buffer.alloc(0)): Buffer =>
    Buffer.concat([Buffer.from([assertByte(serviceId, 'service id') + UDS_POSITIVE_RESPONSE_OFFSET]), Buffer.from(data)]);

export const encodeUdsNegativeResponse = (serviceId: number, responseCode: number): Buffer =>
    Buffer.from([UDS_NEGATIVE_RESPONSE_SID, assertByte(serviceId, 'service id'), assertByte(responseCode, 'response code')]);
