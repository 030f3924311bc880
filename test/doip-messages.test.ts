import {describe, expect, it} from 'vitest';

import {
    DoipPayloadType,
    assertLogicalAddress,
    decodeDoipMessage,
    decodeDoipPacket,
    encodeDoipMessage,
    encodeDoipPacket,
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

const VIN = '1HGCM82633A123456';

describe('DoIP message payloads', () => {
    it('encodes a routing activation request with and without OEM data', () => {
        expect(encodeDoipMessage({
            type: DoipPayloadType.RoutingActivationRequest,
            sourceAddress: 0x0e00,
            activationType: 0x00,
        })).toEqual(hex('0e00 00 00000000'));

        expect(encodeDoipPacket({
            type: DoipPayloadType.RoutingActivationRequest,
            sourceAddress: 0x0e80,
            activationType: 0xe0,
            oem: hex('01020304'),
        })).toEqual(hex('02 fd 0005 0000000b 0e80 e0 00000000 01020304'));
    });

    it('decodes a routing activation response', () => {
        expect(decodeDoipMessage(DoipPayloadType.RoutingActivationResponse, hex('0e00 1001 10 00000000'))).toEqual({
            type: DoipPayloadType.RoutingActivationResponse,
            testerAddress: 0x0e00,
            entityAddress: 0x1001,
            code: 0x10,
        });
    });

    it('keeps the OEM field of a 13 byte routing activation response', () => {
        const message = decodeDoipMessage(DoipPayloadType.RoutingActivationResponse, hex('0e00 1001 10 00000000 cafebabe'));
        expect(message).toMatchObject({code: 0x10, oem: hex('cafebabe')});
    });

    it('rejects routing activation responses of the wrong size', () => {
        expect(thrown(() => decodeDoipMessage(DoipPayloadType.RoutingActivationResponse, hex('0e00 1001 10 000000')))).toMatchObject({
            code: 'MALFORMED_FRAME',
            message: 'RoutingActivationResponse (0x0006) payload has invalid length 8 (expected 9 or 13)',
        });
    });

    it('decodes a vehicle announcement with sync status', () => {
        const payload = Buffer.concat([
            Buffer.from(VIN, 'ascii'),
            hex('1001'),
            hex('00 1a 2b 3c 4d 5e'),
            hex('00 00 00 00 00 01'),
            hex('00'),
            hex('10'),
        ]);
        expect(decodeDoipMessage(DoipPayloadType.VehicleIdentificationResponse, payload)).toEqual({
            type: DoipPayloadType.VehicleIdentificationResponse,
            vin: VIN,
            logicalAddress: 0x1001,
            eid: hex('001a2b3c4d5e'),
            gid: hex('000000000001'),
            furtherAction: 0x00,
            syncStatus: 0x10,
        });
    });

    it('encodes a 32 byte announcement when no sync status is given', () => {
        const payload = encodeDoipMessage({
            type: DoipPayloadType.VehicleIdentificationResponse,
            vin: VIN,
            logicalAddress: 0x2002,
            eid: hex('001a2b3c4d5e'),
            gid: hex('001a2b3c4d5e'),
            furtherAction: 0x10,
        });
        expect(payload.length).toBe(32);
        expect(payload.readUInt16BE(17)).toBe(0x2002);
        expect(payload.readUInt8(31)).toBe(0x10);
    });

    it('refuses to encode a VIN that is not 17 characters', () => {
        expect(() => encodeDoipMessage({
            type: DoipPayloadType.VehicleIdentificationRequestWithVin,
            vin: 'SHORTVIN',
        })).toThrow('VIN must be 17 ASCII characters, got 8');
    });

    it('decodes diagnostic messages and acknowledgements', () => {
        expect(decodeDoipMessage(DoipPayloadType.DiagnosticMessage, hex('1001 0e00 62f190'))).toEqual({
            type: DoipPayloadType.DiagnosticMessage,
            sourceAddress: 0x1001,
            targetAddress: 0x0e00,
            userData: hex('62f190'),
        });
        expect(decodeDoipMessage(DoipPayloadType.DiagnosticMessageNack, hex('1001 0e00 03 22f190'))).toEqual({
            type: DoipPayloadType.DiagnosticMessageNack,
            sourceAddress: 0x1001,
            targetAddress: 0x0e00,
            code: 0x03,
            previous: hex('22f190'),
        });
    });

    it('requires at least one byte of user data', () => {
        expect(() => decodeDoipMessage(DoipPayloadType.DiagnosticMessage, hex('1001 0e00'))).toThrow(
            'DiagnosticMessage (0x8001) payload has invalid length 4 (expected >= 5)',
        );
    });

    it('decodes entity status with the optional max data size', () => {
        expect(decodeDoipMessage(DoipPayloadType.EntityStatusResponse, hex('00 04 01 00001000'))).toEqual({
            type: DoipPayloadType.EntityStatusResponse,
            nodeType: 0x00,
            maxOpenSockets: 4,
            openSockets: 1,
            maxDataSize: 4096,
        });
    });

    it('decodes a complete alive check request packet', () => {
        const {frame, message} = decodeDoipPacket(hex('02 fd 0007 00000000'));
        expect(frame.payloadLength).toBe(0);
        expect(message).toEqual({type: DoipPayloadType.AliveCheckRequest});
    });

    it('encodes alive check responses with the tester address', () => {
        expect(encodeDoipPacket({type: DoipPayloadType.AliveCheckResponse, sourceAddress: 0x0e00})).toEqual(
            hex('02 fd 0008 00000002 0e00'),
        );
    });

    it('validates logical addresses', () => {
        expect(assertLogicalAddress(0xffff)).toBe(0xffff);
        expect(() => assertLogicalAddress(0x10000)).toThrow('DoIP logical address must be 0x0000-0xFFFF, got 65536');
        expect(() => encodeDoipMessage({
            type: DoipPayloadType.DiagnosticMessage,
            sourceAddress: -1,
            targetAddress: 0x1001,
            userData: hex('3e00'),
        })).toThrow('DoIP source address must be 0x0000-0xFFFF, got -1');
    });
});
