/**
 * Transport-agnostic UDS client: serialised request/response exchanges and
 * the diagnostic services built on top of them.
 * @module uds/client
 */
import {EventEmitter} from 'events';

import {
    DiagnosticSession,
    EcuResetType,
    UdsService,
    serviceName,
} from './constants';
import type {UdsRequest, UdsResponse, UdsPositiveResponse} from './codec';
import {
    DEFAULT_DID_CODECS,
    mergeDidCodecs,
    type DidCodec,
    type DidCodecTable,
    type DidValue,
} from './data-identifiers';
import {negativeResponseError, UdsError} from './errors';
import {UdsSession, type SecurityState, type UdsSessionOptions, type UdsSessionState} from './session';

/**
 * Byte pipe the client runs its exchanges over. A DoIP connection satisfies it.
 */
export interface UdsTransport {
    /** Delivers one request payload to the ECU. */
    send(payload: Buffer): Promise<void>;
    /** Registers for inbound payloads and link loss; returns the unsubscribe function. */
    subscribe(listener: {onPayload: (payload: Buffer) => void; onLinkDown: (error: Error) => void}): () => void;
    /** Marks the link unusable until it is re-established (after ECU reset). */
    invalidate(reason: string): void;
}

export type UdsClientOptions = UdsSessionOptions & {
    /** Codecs merged over the built-in table (VIN at 0xF190). */
    codecs?: DidCodecTable;
};

/** Server timing echoed by DiagnosticSessionControl. */
export type SessionTimings = {
    session: DiagnosticSession;
    /** P2 server max in milliseconds. */
    p2Ms: number;
    /** P2* server max in milliseconds. */
    p2StarMs: number;
};

export interface UdsClientEvents {
    /** Every completed exchange, negative responses included. */
    exchange: [request: UdsRequest, response: UdsResponse];
    /** Background failures (tester present keep-alive). */
    error: [error: Error];
}

/** Computes the SecurityAccess key for a seed. */
export type ComputeKey = (seed: Buffer, level: number) => Buffer | Uint8Array | Promise<Buffer | Uint8Array>;

const assertSecurityLevel = (level: number): number => {
    if (!Number.isInteger(level) || level < 1 || level > 0x7d || level % 2 !== 1) {
        throw new RangeError(`SecurityAccess level must be an odd value 0x01-0x7D, got ${level}`);
    }
    return level;
};

const assertDataIdentifier = (id: number): number => {
    if (!Number.isInteger(id) || id < 0 || id > 0xffff) {
        throw new RangeError(`Data identifier must be 0x0000-0xFFFF, got ${id}`);
    }
    return id;
};

const didBytes = (id: number): Buffer => {
    const out = Buffer.alloc(2);
    out.writeUInt16BE(id, 0);
    return out;
};

const hex16 = (value: number): string => `0x${value.toString(16).padStart(4, '0').toUpperCase()}`;

/**
 * UDS services over a {@link UdsTransport}.
 *
 * `request()` returns negative responses as values; the named service
 * helpers throw `UdsError(NEGATIVE_RESPONSE)` for them instead.
 */
export class UdsClient extends EventEmitter<UdsClientEvents> {
    protected readonly session: UdsSession;
    private readonly codecs: Map<number, DidCodec>;
    private transport: UdsTransport | null = null;
    private unsubscribe: (() => void) | null = null;

    constructor(transport: UdsTransport | null, options: UdsClientOptions = {}) {
        super();
        this.session = new UdsSession(options);
        this.codecs = mergeDidCodecs(DEFAULT_DID_CODECS, options.codecs);
        if (transport) this.attach(transport);
    }

    /** The state machine, for event subscriptions. */
    public getSessionMachine(): UdsSession {
        return this.session;
    }

    public getSession(): DiagnosticSession {
        return this.session.getSession();
    }

    public getSecurityState(): SecurityState {
        return this.session.getSecurityState();
    }

    public getState(): UdsSessionState {
        return this.session.getState();
    }

    /** Registers or replaces the codec of one data identifier. */
    public registerCodec(id: number, codec: DidCodec): void {
        this.codecs.set(assertDataIdentifier(id), codec);
    }

    /**
     * Runs one exchange and returns the tagged response.
     * Only one exchange may be outstanding at a time.
     */
    public async request(request: UdsRequest): Promise<UdsResponse> {
        const transport = this.transport;
        if (!transport) {
            throw new UdsError({
                message: 'UDS client has no transport attached',
                domain: 'transport',
                code: 'LINK_DOWN',
            });
        }
        const {payload, response} = this.session.submit(request);
        const sent = transport.send(payload).catch((err: unknown) => {
            const error = err instanceof Error ? err : new Error(String(err));
            this.session.abort(error);
            throw error;
        });
        const [, result] = await Promise.all([sent, response]);
        this.emit('exchange', request, result);
        return result;
    }

    /**
     * DiagnosticSessionControl. Returns the P2/P2* timings the ECU reports.
     */
    public async changeSession(session: DiagnosticSession): Promise<SessionTimings> {
        const response = await this.expectPositive({
            serviceId: UdsService.DiagnosticSessionControl,
            subFunction: session,
        });
        return {
            session: response.data.readUInt8(0) & 0x7f,
            p2Ms: response.data.readUInt16BE(1),
            p2StarMs: response.data.readUInt16BE(3) * 10,
        };
    }

    /**
     * ReadDataByIdentifier decoded with the codec registered for `id`.
     * Without a codec the record cannot be interpreted: the read still runs,
     * then fails with `UdsError(UNKNOWN_IDENTIFIER_CODEC)` carrying the raw
     * record in `payload`.
     */
    public async readDataByIdentifier(id: number): Promise<DidValue> {
        const record = await this.readDataByIdentifierRaw(id);
        return this.codecFor(id, UdsService.ReadDataByIdentifier, record).decode(record);
    }

    /** ReadDataByIdentifier returning the record bytes undecoded. */
    public async readDataByIdentifierRaw(id: number): Promise<Buffer> {
        assertDataIdentifier(id);
        const response = await this.expectPositive({
            serviceId: UdsService.ReadDataByIdentifier,
            data: didBytes(id),
        });
        this.checkEchoedIdentifier(response, id);
        return Buffer.from(response.data.subarray(2));
    }

    /** WriteDataByIdentifier with the value encoded by the codec registered for `id`. */
    public async writeDataByIdentifier(id: number, value: DidValue): Promise<void> {
        const record = this.codecFor(id, UdsService.WriteDataByIdentifier).encode(value);
        const response = await this.expectPositive({
            serviceId: UdsService.WriteDataByIdentifier,
            data: Buffer.concat([didBytes(id), record]),
        });
        this.checkEchoedIdentifier(response, id);
    }

    /** SecurityAccess requestSeed (`level` is the odd sub-function). */
    public async requestSeed(level: number): Promise<Buffer> {
        const response = await this.securityExchange(assertSecurityLevel(level), Buffer.alloc(0));
        return Buffer.from(response.data.subarray(1));
    }

    /** SecurityAccess sendKey for the level whose seed was requested. */
    public async sendKey(level: number, key: Buffer | Uint8Array): Promise<void> {
        await this.securityExchange(assertSecurityLevel(level) + 1, Buffer.from(key));
    }

    /**
     * Seed/key handshake: request seed for `level`, derive the key with
     * `computeKey`, send it with sub-function `level + 1`. A zero seed means
     * the level is already unlocked and no key is sent.
     */
    public async securityAccess(level: number, computeKey: ComputeKey): Promise<void> {
        const seed = await this.requestSeed(level);
        if (seed.length > 0 && seed.every((byte) => byte === 0)) return;
        const key = await computeKey(seed, level);
        await this.sendKey(level, key);
    }

    /**
     * ECUReset. On success the transport is invalidated; exchanges fail with
     * `LINK_DOWN` until the link is re-established. The same holds for a
     * positive ECUReset sent through {@link request}.
     */
    public async ecuReset(resetType: EcuResetType | number = EcuResetType.HardReset): Promise<void> {
        await this.expectPositive({serviceId: UdsService.EcuReset, subFunction: resetType});
    }

    /** TesterPresent with sub-function 0x00. */
    public async testerPresent(): Promise<void> {
        await this.expectPositive({serviceId: UdsService.TesterPresent, subFunction: 0x00});
    }

    /** Binds the client to a transport, replacing any previous one. */
    protected attach(transport: UdsTransport): void {
        this.detach();
        this.transport = transport;
        const onEcuReset = (resetType: number): void => {
            transport.invalidate(`ECU reset (type 0x${resetType.toString(16).padStart(2, '0')})`);
        };
        this.session.on('ecuReset', onEcuReset);
        const unsubscribe = transport.subscribe({
            onPayload: (payload) => this.session.receive(payload),
            onLinkDown: (error) => this.session.abort(error),
        });
        this.unsubscribe = () => {
            unsubscribe();
            this.session.off('ecuReset', onEcuReset);
        };
    }

    protected detach(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
        this.transport = null;
    }

    private async expectPositive(request: UdsRequest): Promise<UdsPositiveResponse> {
        const response = await this.request(request);
        if (response.kind === 'negative') {
            throw negativeResponseError(response.serviceId, response.responseCode);
        }
        return response;
    }

    private async securityExchange(subFunction: number, key: Buffer): Promise<UdsPositiveResponse> {
        const response = await this.request({serviceId: UdsService.SecurityAccess, subFunction, data: key});
        if (response.kind === 'negative') {
            throw negativeResponseError(response.serviceId, response.responseCode, 'SECURITY_ACCESS_DENIED');
        }
        return response;
    }

    private codecFor(id: number, serviceId: number, record?: Buffer): DidCodec {
        const codec = this.codecs.get(assertDataIdentifier(id));
        if (!codec) {
            throw new UdsError({
                message: `No codec registered for data identifier ${hex16(id)}`,
                domain: 'codec',
                code: 'UNKNOWN_IDENTIFIER_CODEC',
                serviceId,
                payload: record,
                details: {dataIdentifier: id},
            });
        }
        return codec;
    }

    private checkEchoedIdentifier(response: UdsPositiveResponse, id: number): void {
        const echoed = response.data.readUInt16BE(0);
        if (echoed !== id) {
            throw new UdsError({
                message: `${serviceName(response.serviceId)} echoed data identifier ${hex16(echoed)}, expected ${hex16(id)}`,
                domain: 'decode',
                code: 'IDENTIFIER_MISMATCH',
                serviceId: response.serviceId,
                payload: Buffer.from(response.data),
                details: {expected: id, actual: echoed},
            });
        }
    }
}
