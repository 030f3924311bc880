/**
 * DoIP payload encoders/decoders.
 * @module doip/messages
 *
 * Standard reference:
 * - ISO 13400-2:2012, clause 7 (payload type specific message content)
 */
import {
    DOIP_DEFAULT_PROTOCOL_VERSION,
    DOIP_EID_LENGTH,
    DOIP_GID_LENGTH,
    DOIP_VIN_LENGTH,
    DoipPayloadType,
    doipPayloadTypeName,
} from './constants';
import {DoipError} from './errors';
import {decodeDoipFrame, encodeDoipFrame, type DoipFrame} from './frame';

export type DoipGenericNackMessage = {
    type: DoipPayloadType.GenericNack;
    code: number;
};

export type DoipVehicleIdentificationRequest = {
    type: DoipPayloadType.VehicleIdentificationRequest;
};

export type DoipVehicleIdentificationRequestWithEid = {
    type: DoipPayloadType.VehicleIdentificationRequestWithEid;
    eid: Buffer;
};

export type DoipVehicleIdentificationRequestWithVin = {
    type: DoipPayloadType.VehicleIdentificationRequestWithVin;
    vin: string;
};

/** Vehicle announcement / vehicle identification response. */
export type DoipVehicleAnnouncement = {
    type: DoipPayloadType.VehicleIdentificationResponse;
    vin: string;
    logicalAddress: number;
    eid: Buffer;
    gid: Buffer;
    furtherAction: number;
    /** VIN/GID synchronisation status, only present on 33-byte announcements. */
    syncStatus?: number;
};

export type DoipRoutingActivationRequest = {
    type: DoipPayloadType.RoutingActivationRequest;
    sourceAddress: number;
    activationType: number;
    oem?: Buffer;
};

export type DoipRoutingActivationResponse = {
    type: DoipPayloadType.RoutingActivationResponse;
    testerAddress: number;
    entityAddress: number;
    code: number;
    oem?: Buffer;
};

export type DoipAliveCheckRequest = {
    type: DoipPayloadType.AliveCheckRequest;
};

export type DoipAliveCheckResponse = {
    type: DoipPayloadType.AliveCheckResponse;
    sourceAddress: number;
};

export type DoipEntityStatusRequest = {
    type: DoipPayloadType.EntityStatusRequest;
};

export type DoipEntityStatusResponse = {
    type: DoipPayloadType.EntityStatusResponse;
    nodeType: number;
    maxOpenSockets: number;
    openSockets: number;
    maxDataSize?: number;
};

export type DoipPowerModeRequest = {
    type: DoipPayloadType.DiagnosticPowerModeRequest;
};

export type DoipPowerModeResponse = {
    type: DoipPayloadType.DiagnosticPowerModeResponse;
    powerMode: number;
};

export type DoipDiagnosticMessage = {
    type: DoipPayloadType.DiagnosticMessage | DoipPayloadType.PeriodicDiagnosticMessage;
    sourceAddress: number;
    targetAddress: number;
    userData: Buffer;
};

export type DoipDiagnosticAck = {
    type: DoipPayloadType.DiagnosticMessageAck | DoipPayloadType.DiagnosticMessageNack;
    sourceAddress: number;
    targetAddress: number;
    code: number;
    /** Echo of the acknowledged diagnostic message, may be empty. */
    previous: Buffer;
};

export type DoipMessage =
    | DoipGenericNackMessage
    | DoipVehicleIdentificationRequest
    | DoipVehicleIdentificationRequestWithEid
    | DoipVehicleIdentificationRequestWithVin
    | DoipVehicleAnnouncement
    | DoipRoutingActivationRequest
    | DoipRoutingActivationResponse
    | DoipAliveCheckRequest
    | DoipAliveCheckResponse
    | DoipEntityStatusRequest
    | DoipEntityStatusResponse
    | DoipPowerModeRequest
    | DoipPowerModeResponse
    | DoipDiagnosticMessage
    | DoipDiagnosticAck;

/** Validate a 16-bit logical address. */
export const assertLogicalAddress = (address: number, label = 'logical address'): number => {
    if (!Number.isInteger(address) || address < 0 || address > 0xffff) {
        throw new RangeError(`DoIP ${label} must be 0x0000-0xFFFF, got ${address}`);
    }
    return address;
};

const invalidLength = (type: DoipPayloadType, length: number, expected: string): DoipError => new DoipError({
    message: `${doipPayloadTypeName(type)} payload has invalid length ${length} (expected ${expected})`,
    domain: 'frame',
    code: 'MALFORMED_FRAME',
    details: {payloadType: type, length},
});

const fixedBuffer = (value: Buffer, length: number, label: string): Buffer => {
    if (value.length !== length) {
        throw new RangeError(`DoIP ${label} must be ${length} bytes, got ${value.length}`);
    }
    return value;
};

const encodeVin = (vin: string): Buffer => {
    const bytes = Buffer.from(vin, 'ascii');
    if (bytes.length !== DOIP_VIN_LENGTH) {
        throw new RangeError(`VIN must be ${DOIP_VIN_LENGTH} ASCII characters, got ${bytes.length}`);
    }
    return bytes;
};

const addressPair = (sourceAddress: number, targetAddress: number, tailLength: number): Buffer => {
    const out = Buffer.alloc(4 + tailLength);
    out.writeUInt16BE(assertLogicalAddress(sourceAddress, 'source address'), 0);
    out.writeUInt16BE(assertLogicalAddress(targetAddress, 'target address'), 2);
    return out;
};

/**
 * Encode the payload (without generic header) of one DoIP message.
 */
export const encodeDoipMessage = (message: DoipMessage): Buffer => {
    switch (message.type) {
        case DoipPayloadType.GenericNack:
            return Buffer.from([message.code & 0xff]);
        case DoipPayloadType.VehicleIdentificationRequest:
        case DoipPayloadType.AliveCheckRequest:
        case DoipPayloadType.EntityStatusRequest:
        case DoipPayloadType.DiagnosticPowerModeRequest:
            return Buffer.alloc(0);
        case DoipPayloadType.VehicleIdentificationRequestWithEid:
            return Buffer.from(fixedBuffer(message.eid, DOIP_EID_LENGTH, 'EID'));
        case DoipPayloadType.VehicleIdentificationRequestWithVin:
            return encodeVin(message.vin);
        case DoipPayloadType.VehicleIdentificationResponse: {
            const out = Buffer.alloc(message.syncStatus === undefined ? 32 : 33);
            encodeVin(message.vin).copy(out, 0);
            out.writeUInt16BE(assertLogicalAddress(message.logicalAddress), 17);
            fixedBuffer(message.eid, DOIP_EID_LENGTH, 'EID').copy(out, 19);
            fixedBuffer(message.gid, DOIP_GID_LENGTH, 'GID').copy(out, 25);
            out.writeUInt8(message.furtherAction & 0xff, 31);
            if (message.syncStatus !== undefined) out.writeUInt8(message.syncStatus & 0xff, 32);
            return out;
        }
        case DoipPayloadType.RoutingActivationRequest: {
            const oem = message.oem ? fixedBuffer(message.oem, 4, 'OEM field') : null;
            const out = Buffer.alloc(oem ? 11 : 7);
            out.writeUInt16BE(assertLogicalAddress(message.sourceAddress, 'source address'), 0);
            out.writeUInt8(message.activationType & 0xff, 2);
            oem?.copy(out, 7);
            return out;
        }
        case DoipPayloadType.RoutingActivationResponse: {
            const oem = message.oem ? fixedBuffer(message.oem, 4, 'OEM field') : null;
            const out = addressPair(message.testerAddress, message.entityAddress, oem ? 9 : 5);
            out.writeUInt8(message.code & 0xff, 4);
            oem?.copy(out, 9);
            return out;
        }
        case DoipPayloadType.AliveCheckResponse: {
            const out = Buffer.alloc(2);
            out.writeUInt16BE(assertLogicalAddress(message.sourceAddress, 'source address'), 0);
            return out;
        }
        case DoipPayloadType.EntityStatusResponse: {
            const out = Buffer.alloc(message.maxDataSize === undefined ? 3 : 7);
            out.writeUInt8(message.nodeType & 0xff, 0);
            out.writeUInt8(message.maxOpenSockets & 0xff, 1);
            out.writeUInt8(message.openSockets & 0xff, 2);
            if (message.maxDataSize !== undefined) out.writeUInt32BE(message.maxDataSize >>> 0, 3);
            return out;
        }
        case DoipPayloadType.DiagnosticPowerModeResponse:
            return Buffer.from([message.powerMode & 0xff]);
        case DoipPayloadType.DiagnosticMessage:
        case DoipPayloadType.PeriodicDiagnosticMessage: {
            const out = addressPair(message.sourceAddress, message.targetAddress, message.userData.length);
            message.userData.copy(out, 4);
            return out;
        }
        case DoipPayloadType.DiagnosticMessageAck:
        case DoipPayloadType.DiagnosticMessageNack: {
            const out = addressPair(message.sourceAddress, message.targetAddress, 1 + message.previous.length);
            out.writeUInt8(message.code & 0xff, 4);
            message.previous.copy(out, 5);
            return out;
        }
    }
};

/**
 * Decode one payload for a known payload type.
 * Throws `DoipError(MALFORMED_FRAME)` when the payload length does not fit the type.
 */
export const decodeDoipMessage = (type: DoipPayloadType, payload: Buffer): DoipMessage => {
    const length = payload.length;
    switch (type) {
        case DoipPayloadType.GenericNack:
            if (length !== 1) throw invalidLength(type, length, '1');
            return {type, code: payload.readUInt8(0)};
        case DoipPayloadType.VehicleIdentificationRequest:
        case DoipPayloadType.AliveCheckRequest:
        case DoipPayloadType.EntityStatusRequest:
        case DoipPayloadType.DiagnosticPowerModeRequest:
            if (length !== 0) throw invalidLength(type, length, '0');
            return {type};
        case DoipPayloadType.VehicleIdentificationRequestWithEid:
            if (length !== DOIP_EID_LENGTH) throw invalidLength(type, length, String(DOIP_EID_LENGTH));
            return {type, eid: Buffer.from(payload)};
        case DoipPayloadType.VehicleIdentificationRequestWithVin:
            if (length !== DOIP_VIN_LENGTH) throw invalidLength(type, length, String(DOIP_VIN_LENGTH));
            return {type, vin: payload.toString('ascii')};
        case DoipPayloadType.VehicleIdentificationResponse: {
            if (length !== 32 && length !== 33) throw invalidLength(type, length, '32 or 33');
            const announcement: DoipVehicleAnnouncement = {
                type,
                vin: payload.toString('ascii', 0, 17),
                logicalAddress: payload.readUInt16BE(17),
                eid: Buffer.from(payload.subarray(19, 25)),
                gid: Buffer.from(payload.subarray(25, 31)),
                furtherAction: payload.readUInt8(31),
            };
            if (length === 33) announcement.syncStatus = payload.readUInt8(32);
            return announcement;
        }
        case DoipPayloadType.RoutingActivationRequest: {
            if (length !== 7 && length !== 11) throw invalidLength(type, length, '7 or 11');
            const request: DoipRoutingActivationRequest = {
                type,
                sourceAddress: payload.readUInt16BE(0),
                activationType: payload.readUInt8(2),
            };
            if (length === 11) request.oem = Buffer.from(payload.subarray(7, 11));
            return request;
        }
        case DoipPayloadType.RoutingActivationResponse: {
            if (length !== 9 && length !== 13) throw invalidLength(type, length, '9 or 13');
            const response: DoipRoutingActivationResponse = {
                type,
                testerAddress: payload.readUInt16BE(0),
                entityAddress: payload.readUInt16BE(2),
                code: payload.readUInt8(4),
            };
            if (length === 13) response.oem = Buffer.from(payload.subarray(9, 13));
            return response;
        }
        case DoipPayloadType.AliveCheckResponse:
            if (length !== 2) throw invalidLength(type, length, '2');
            return {type, sourceAddress: payload.readUInt16BE(0)};
        case DoipPayloadType.EntityStatusResponse: {
            if (length !== 3 && length !== 7) throw invalidLength(type, length, '3 or 7');
            const status: DoipEntityStatusResponse = {
                type,
                nodeType: payload.readUInt8(0),
                maxOpenSockets: payload.readUInt8(1),
                openSockets: payload.readUInt8(2),
            };
            if (length === 7) status.maxDataSize = payload.readUInt32BE(3);
            return status;
        }
        case DoipPayloadType.DiagnosticPowerModeResponse:
            if (length !== 1) throw invalidLength(type, length, '1');
            return {type, powerMode: payload.readUInt8(0)};
        case DoipPayloadType.DiagnosticMessage:
        case DoipPayloadType.PeriodicDiagnosticMessage:
            if (length < 5) throw invalidLength(type, length, '>= 5');
            return {
                type,
                sourceAddress: payload.readUInt16BE(0),
                targetAddress: payload.readUInt16BE(2),
                userData: Buffer.from(payload.subarray(4)),
            };
        case DoipPayloadType.DiagnosticMessageAck:
        case DoipPayloadType.DiagnosticMessageNack:
            if (length < 5) throw invalidLength(type, length, '>= 5');
            return {
                type,
                sourceAddress: payload.readUInt16BE(0),
                targetAddress: payload.readUInt16BE(2),
                code: payload.readUInt8(4),
                previous: Buffer.from(payload.subarray(5)),
            };
    }
};

/** Encode a message together with its generic header. */
export const encodeDoipPacket = (message: DoipMessage, protocolVersion = DOIP_DEFAULT_PROTOCOL_VERSION): Buffer =>
    encodeDoipFrame(message.type, encodeDoipMessage(message), protocolVersion);

/** Decode the payload of an already framed message. */
export const decodeDoipFramePayload = (frame: DoipFrame): DoipMessage => decodeDoipMessage(frame.payloadType, frame.payload);

/** Decode one complete datagram or frame buffer into a message. */
export const decodeDoipPacket = (buffer: Buffer): {frame: DoipFrame; message: DoipMessage} => {
    const frame = decodeDoipFrame(buffer);
    return {frame, message: decodeDoipFramePayload(frame)};
};
