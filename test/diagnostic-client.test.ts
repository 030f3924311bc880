import {EventEmitter} from 'events';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

class MockSocket extends EventEmitter {
    public writes: Buffer[] = [];
    public destroyed = false;

    public write(chunk: Buffer | Uint8Array, cb?: (err?: Error | null) => void): boolean {
        const packet = Buffer.from(chunk);
        this.writes.push(packet);
        cb?.(null);
        queueMicrotask(() => gateway.onPacket?.(this, packet));
        return true;
    }

    public destroy(): this {
        if (this.destroyed) return this;
        this.destroyed = true;
        this.emit('close', false);
        return this;
    }
}

const gateway: {onPacket: ((socket: MockSocket, packet: Buffer) => void) | null} = {onPacket: null};
const sockets: MockSocket[] = [];

vi.mock('net', () => ({
    createConnection: vi.fn(() => {
        const socket = new MockSocket();
        sockets.push(socket);
        queueMicrotask(() => socket.emit('connect'));
        return socket;
    }),
}));

import {
    DataIdentifier,
    DiagnosticClient,
    DiagnosticSession,
    DoipPayloadType,
    EcuResetType,
    UdsNrc,
    decodeDoipPacket,
    encodeDoipPacket,
    encodeUdsNegativeResponse,
    encodeUdsPositiveResponse,
    formatDiagnosticError,
    withDiagnosticClient,
    type UdsRequest,
    type UdsResponse,
} from '../src';

const TESTER = 0x0e00;
const ECU = 0x1001;
const HOST = '192.0.2.10';

const hex = (value: string): Buffer => Buffer.from(value.replace(/\s+/g, ''), 'hex');

/**
 * Scripted ECU behind the mocked DoIP gateway. Each request is answered with
 * the responses returned for it, in order.
 */
class SimulatedEcu {
    public vin = '1HGCM82633A123456';
    public requests: Buffer[] = [];
    public rejectWritesWith: number | null = null;
    public rejectTesterPresentWith: number | null = null;
    public pendingBeforeAnswer = 0;
    public silent = false;
    /** Delay before diagnostic replies; the DoIP ack is never delayed. */
    public replyDelayMs = 0;

    public answer(request: Buffer): Buffer[] {
        this.requests.push(request);
        if (this.silent) return [];
        const sid = request.readUInt8(0);
        const pending = Array.from({length: this.pendingBeforeAnswer}, () => encodeUdsNegativeResponse(sid, UdsNrc.ResponsePending));
        return [...pending, this.finalAnswer(sid, request)];
    }

    private finalAnswer(sid: number, request: Buffer): Buffer {
        switch (sid) {
            case 0x10:
                return encodeUdsPositiveResponse(sid, Buffer.concat([request.subarray(1, 2), hex('0032 01f4')]));
            case 0x11:
                return encodeUdsPositiveResponse(sid, request.subarray(1, 2));
            case 0x22: {
                const did = request.readUInt16BE(1);
                if (did === DataIdentifier.Vin) {
                    return encodeUdsPositiveResponse(sid, Buffer.concat([request.subarray(1, 3), Buffer.from(this.vin, 'ascii')]));
                }
                if (did === DataIdentifier.ActiveDiagnosticSession) {
                    return encodeUdsPositiveResponse(sid, Buffer.concat([request.subarray(1, 3), hex('03')]));
                }
                if (did === 0xf18c) {
                    return encodeUdsPositiveResponse(sid, Buffer.concat([request.subarray(1, 3), Buffer.from('SN-0001', 'ascii')]));
                }
                return encodeUdsNegativeResponse(sid, UdsNrc.RequestOutOfRange);
            }
            case 0x27: {
                const level = request.readUInt8(1);
                if (level % 2 === 1) return encodeUdsPositiveResponse(sid, Buffer.concat([request.subarray(1, 2), hex('1234')]));
                return request.subarray(2).equals(hex('edcb'))
                    ? encodeUdsPositiveResponse(sid, request.subarray(1, 2))
                    : encodeUdsNegativeResponse(sid, UdsNrc.InvalidKey);
            }
            case 0x2e:
                if (this.rejectWritesWith !== null) return encodeUdsNegativeResponse(sid, this.rejectWritesWith);
                this.vin = request.subarray(3).toString('ascii');
                return encodeUdsPositiveResponse(sid, request.subarray(1, 3));
            case 0x3e:
                if (this.rejectTesterPresentWith !== null) return encodeUdsNegativeResponse(sid, this.rejectTesterPresentWith);
                return encodeUdsPositiveResponse(sid, hex('00'));
            default:
                return encodeUdsNegativeResponse(sid, UdsNrc.ServiceNotSupported);
        }
    }
}

let ecu: SimulatedEcu;

const deliver = (socket: MockSocket, message: Parameters<typeof encodeDoipPacket>[0]): void => {
    socket.emit('data', encodeDoipPacket(message));
};

const attachGateway = (): void => {
    gateway.onPacket = (socket, packet) => {
        const {message} = decodeDoipPacket(packet);
        if (message.type === DoipPayloadType.RoutingActivationRequest) {
            deliver(socket, {
                type: DoipPayloadType.RoutingActivationResponse,
                testerAddress: message.sourceAddress,
                entityAddress: ECU,
                code: 0x10,
            });
            return;
        }
        if (message.type !== DoipPayloadType.DiagnosticMessage) return;
        deliver(socket, {
            type: DoipPayloadType.DiagnosticMessageAck,
            sourceAddress: ECU,
            targetAddress: TESTER,
            code: 0x00,
            previous: Buffer.alloc(0),
        });
        const replies = ecu.answer(message.userData);
        const reply = (): void => {
            if (socket.destroyed) return;
            for (const userData of replies) {
                deliver(socket, {type: DoipPayloadType.DiagnosticMessage, sourceAddress: ECU, targetAddress: TESTER, userData});
            }
        };
        if (ecu.replyDelayMs > 0) setTimeout(reply, ecu.replyDelayMs);
        else reply();
    };
};

const clients: DiagnosticClient[] = [];

const connect = async (): Promise<DiagnosticClient> => {
    const client = await DiagnosticClient.connect({host: HOST});
    clients.push(client);
    return client;
};

beforeEach(() => {
    sockets.length = 0;
    ecu = new SimulatedEcu();
    attachGateway();
});

afterEach(() => {
    for (const client of clients.splice(0)) client.close();
});

describe('DiagnosticClient', () => {
    it('reads the VIN through DoIP routing', async () => {
        const client = await connect();

        await expect(client.readDataByIdentifier(DataIdentifier.Vin)).resolves.toBe('1HGCM82633A123456');

        expect(sockets[0]?.writes[1]).toEqual(hex('02 fd 8001 00000007 0e00 1001 22f190'));
        expect(ecu.requests).toEqual([hex('22f190')]);
    });

    it('writes a new VIN and surfaces a rejected write', async () => {
        const client = await connect();

        await client.writeDataByIdentifier(DataIdentifier.Vin, 'ABC123456789GHIJK');
        expect(ecu.requests[0]).toEqual(Buffer.concat([hex('2ef190'), Buffer.from('ABC123456789GHIJK', 'ascii')]));
        await expect(client.readDataByIdentifier(DataIdentifier.Vin)).resolves.toBe('ABC123456789GHIJK');

        ecu.rejectWritesWith = UdsNrc.RequestOutOfRange;
        const error: unknown = await client.writeDataByIdentifier(DataIdentifier.Vin, 'ABC123456789GHIJK').catch((err: unknown) => err);
        expect(error).toMatchObject({
            name: 'UdsError',
            code: 'NEGATIVE_RESPONSE',
            serviceId: 0x2e,
            responseCode: 0x31,
            message: 'WriteDataByIdentifier (0x2E) rejected: RequestOutOfRange (NRC 0x31)',
        });
        expect(formatDiagnosticError(error)).toBe(
            '[UDS NEGATIVE_RESPONSE] WriteDataByIdentifier (0x2E) rejected: RequestOutOfRange (NRC 0x31)',
        );
    });

    it('refuses to encode a VIN of the wrong length before sending', async () => {
        const client = await connect();
        await expect(client.writeDataByIdentifier(DataIdentifier.Vin, 'TOO-SHORT')).rejects.toThrow(
            'ascii(17) expects 17 bytes, got 9',
        );
        expect(ecu.requests).toEqual([]);
    });

    it('reads the record and reports it when no codec can interpret it', async () => {
        const client = await connect();
        const error: unknown = await client.readDataByIdentifier(0xf18c).catch((err: unknown) => err);

        expect(error).toMatchObject({
            code: 'UNKNOWN_IDENTIFIER_CODEC',
            message: 'No codec registered for data identifier 0xF18C',
            payload: Buffer.from('SN-0001', 'ascii'),
        });
        expect(formatDiagnosticError(error)).toBe(
            '[UDS UNKNOWN_IDENTIFIER_CODEC] No codec registered for data identifier 0xF18C (payload: 53 4E 2D 30 30 30 31)',
        );
        expect(ecu.requests).toEqual([hex('22f18c')]);
        await expect(client.readDataByIdentifierRaw(DataIdentifier.Vin)).resolves.toEqual(Buffer.from('1HGCM82633A123456', 'ascii'));
    });

    it('invalidates the link after ECU reset until reconnected', async () => {
        const client = await connect();
        await client.changeSession(DiagnosticSession.Extended);

        await client.ecuReset(EcuResetType.HardReset);

        expect(client.getSession()).toBe(DiagnosticSession.Default);
        expect(client.getConnection().isInvalidated()).toBe(true);
        await expect(client.testerPresent()).rejects.toMatchObject({
            name: 'DoipError',
            code: 'LINK_DOWN',
            message: 'DoIP connection invalidated: ECU reset (type 0x01)',
        });
        expect(client.getState()).toBe('idle');

        await client.reconnect();

        expect(sockets).toHaveLength(2);
        await expect(client.testerPresent()).resolves.toBeUndefined();
        expect(ecu.requests.map((request) => request.toString('hex'))).toEqual(['1003', '1101', '3e00']);
    });

    it('invalidates the link after a positive ECU reset sent through request()', async () => {
        const client = await connect();

        await expect(client.request({serviceId: 0x11, subFunction: 0x01})).resolves.toEqual({
            kind: 'positive',
            serviceId: 0x11,
            data: hex('01'),
        });

        expect(client.getConnection().isInvalidated()).toBe(true);
        await expect(client.testerPresent()).rejects.toMatchObject({
            code: 'LINK_DOWN',
            message: 'DoIP connection invalidated: ECU reset (type 0x01)',
        });
        expect(ecu.requests).toEqual([hex('1101')]);
    });

    it('reports session timings from DiagnosticSessionControl', async () => {
        const client = await connect();
        await expect(client.changeSession(DiagnosticSession.Extended)).resolves.toEqual({
            session: DiagnosticSession.Extended,
            p2Ms: 50,
            p2StarMs: 5000,
        });
        expect(client.getSession()).toBe(DiagnosticSession.Extended);
    });

    it('unlocks security access with the computed key', async () => {
        const client = await connect();
        const computeKey = vi.fn((seed: Buffer) => Buffer.from(seed.map((byte) => byte ^ 0xff)));

        await client.securityAccess(0x01, computeKey);

        expect(computeKey).toHaveBeenCalledWith(hex('1234'), 0x01);
        expect(ecu.requests.map((request) => request.toString('hex'))).toEqual(['2701', '2702edcb']);
        expect(client.getSecurityState()).toEqual({status: 'unlocked', level: 0x01});
    });

    it('reports a rejected key as security access denied', async () => {
        const client = await connect();
        await expect(client.securityAccess(0x01, () => hex('0000'))).rejects.toMatchObject({
            code: 'SECURITY_ACCESS_DENIED',
            domain: 'security',
            responseCode: UdsNrc.InvalidKey,
        });
        expect(client.getSecurityState()).toEqual({status: 'locked'});
    });

    it('validates the security level', async () => {
        const client = await connect();
        await expect(client.requestSeed(0x02)).rejects.toThrow('SecurityAccess level must be an odd value 0x01-0x7D, got 2');
    });

    it('waits through response pending answers', async () => {
        ecu.pendingBeforeAnswer = 2;
        const client = await connect();
        const pending: number[] = [];
        client.getSessionMachine().on('responsePending', (_sid, extension) => pending.push(extension));

        await expect(client.readDataByIdentifier(DataIdentifier.ActiveDiagnosticSession)).resolves.toBe(3);
        expect(pending).toEqual([1, 2]);
    });

    it('allows one outstanding request at a time', async () => {
        const client = await connect();
        const first = client.readDataByIdentifier(DataIdentifier.Vin);
        const second = client.testerPresent();

        await expect(second).rejects.toMatchObject({code: 'EXCHANGE_IN_PROGRESS'});
        await expect(first).resolves.toBe('1HGCM82633A123456');
    });

    it('returns negative responses from request() and emits every exchange', async () => {
        const client = await connect();
        const exchanges: Array<[UdsRequest, UdsResponse]> = [];
        client.on('exchange', (request, response) => exchanges.push([request, response]));

        const response = await client.request({serviceId: 0x22, data: hex('0101')});

        expect(response).toEqual({kind: 'negative', serviceId: 0x22, responseCode: UdsNrc.RequestOutOfRange});
        expect(exchanges).toHaveLength(1);
    });

    it('times out when the ECU acknowledges but never answers', async () => {
        ecu.silent = true;
        const client = await DiagnosticClient.connect({host: HOST, requestTimeoutMs: 30});
        clients.push(client);
        await expect(client.testerPresent()).rejects.toMatchObject({
            code: 'TIMEOUT',
            message: 'No response to TesterPresent within 30ms',
        });
    });

    it('keeps the session alive with periodic tester present', async () => {
        const client = await connect();
        client.startTesterPresent(10);
        expect(client.isTesterPresentActive()).toBe(true);

        await vi.waitFor(() => expect(ecu.requests.length).toBeGreaterThanOrEqual(2));
        client.stopTesterPresent();

        expect(client.isTesterPresentActive()).toBe(false);
        expect(new Set(ecu.requests.map((request) => request.toString('hex')))).toEqual(new Set(['3e00']));
    });

    it('lets a request wait for a keep-alive that is still in flight', async () => {
        ecu.replyDelayMs = 30;
        const client = await connect();
        const keepAliveSent = new Promise<void>((resolve) => {
            client.getSessionMachine().once('stateChange', () => resolve());
        });

        client.startTesterPresent(10);
        await keepAliveSent;
        expect(client.getState()).toBe('awaiting_response');

        await expect(client.readDataByIdentifier(DataIdentifier.Vin)).resolves.toBe('1HGCM82633A123456');
        client.stopTesterPresent();

        expect(ecu.requests.slice(0, 2)).toEqual([hex('3e00'), hex('22f190')]);
    });

    it('stops the keep-alive and emits the failure', async () => {
        ecu.rejectTesterPresentWith = UdsNrc.ConditionsNotCorrect;
        const client = await connect();
        const errors: Error[] = [];
        client.on('error', (err) => errors.push(err));

        client.startTesterPresent(10);
        await vi.waitFor(() => expect(errors).toHaveLength(1));

        expect(errors[0]?.message).toBe('TesterPresent (0x3E) rejected: ConditionsNotCorrect (NRC 0x22)');
        expect(client.isTesterPresentActive()).toBe(false);
    });

    it('closes the client after withDiagnosticClient', async () => {
        const vin = await withDiagnosticClient({host: HOST}, (client) => client.readDataByIdentifier(DataIdentifier.Vin));
        expect(vin).toBe('1HGCM82633A123456');
        expect(sockets[0]?.destroyed).toBe(true);
    });
});
