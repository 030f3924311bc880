/**
 * ISO 13400-2 (DoIP) TCP client connection.
 * @module doip/connection
 *
 * Lifecycle: `disconnected -> tcp_connected -> routing_activation -> active`.
 * The connection owns its socket; diagnostic payloads are handed to
 * subscribers (the UDS layer) after source/target demultiplexing.
 */
import * as net from 'net';
import type {Socket} from 'net';
import * as tls from 'tls';
import type {ConnectionOptions as TlsConnectionOptions} from 'tls';
import {EventEmitter} from 'events';

import {
    DOIP_DEFAULT_DIAGNOSTIC_ACK_TIMEOUT_MS,
    DOIP_DEFAULT_MAX_BUFFER_BYTES,
    DOIP_DEFAULT_PORT,
    DOIP_DEFAULT_PROTOCOL_VERSION,
    DOIP_DEFAULT_RECONNECT_DELAY_MS,
    DOIP_DEFAULT_RECONNECT_MAX_DELAY_MS,
    DOIP_DEFAULT_ROUTING_ACTIVATION_TIMEOUT_MS,
    DOIP_DEFAULT_TESTER_ADDRESS,
    DOIP_DEFAULT_TLS_PORT,
    DoipPayloadType,
    DoipRoutingActivationCode,
    DoipRoutingActivationType,
} from './constants';
import {
    diagnosticNackError,
    DoipError,
    doipLinkDown,
    doipTimeout,
    genericNackError,
    mapRoutingActivationCodeToError,
} from './errors';
import {encodeDoipFrame, extractDoipFrames, type DoipFrame} from './frame';
import {
    assertLogicalAddress,
    decodeDoipFramePayload,
    encodeDoipMessage,
    type DoipDiagnosticAck,
    type DoipDiagnosticMessage,
    type DoipMessage,
    type DoipRoutingActivationResponse,
} from './messages';

export type DoipConnectionState = 'disconnected' | 'tcp_connected' | 'routing_activation' | 'active';

/**
 * Configuration for a {@link DoipConnection}.
 */
export type DoipConnectionOptions = {
    /** DoIP entity hostname or IP address. */
    host: string;
    /** TCP port. Defaults to 13400, or 3496 for TLS. */
    port?: number;
    /** Optional local interface address to bind for outbound connections. */
    localAddress?: string;
    /** Transport mode. Defaults to `'tcp'`. */
    transport?: 'tcp' | 'tls';
    /** TLS options forwarded to `tls.connect()` when `transport` is `'tls'`. */
    tls?: Omit<TlsConnectionOptions, 'host' | 'port'>;
    /** Require TLS peer authorization. Defaults to `true` for TLS. */
    requireTlsAuthorization?: boolean;
    /** Tester (client) logical address. Defaults to 0x0E00. */
    testerAddress?: number;
    /**
     * Logical address of the target ECU. Defaults to the entity address
     * reported in the routing activation response.
     */
    ecuAddress?: number;
    /** Routing activation type. Defaults to {@link DoipRoutingActivationType.Default}. */
    activationType?: number;
    /** Optional 4-byte OEM specific field sent with routing activation. */
    activationOemData?: Buffer;
    /** Protocol version written into every header. */
    protocolVersion?: number;
    routingActivationTimeoutMs?: number;
    /** Time to wait for the diagnostic message ack of each sent payload. */
    diagnosticAckTimeoutMs?: number;
    /** Wait for the entity's diagnostic ack in `sendDiagnostic()`. Default: `true`. */
    waitForDiagnosticAck?: boolean;
    /** Re-establish the link after unexpected loss. Default: `false`. */
    autoReconnect?: boolean;
    reconnectDelayMs?: number;
    reconnectMaxDelayMs?: number;
    /** Maximum buffered stream bytes before framing-corruption protection triggers. */
    maxBufferBytes?: number;
};

/** Diagnostic traffic addressed to this tester by its ECU. */
export type DiagnosticEvent =
    | {kind: 'message'; sourceAddress: number; targetAddress: number; userData: Buffer}
    | {kind: 'ack'; sourceAddress: number; targetAddress: number; code: number; previous: Buffer}
    | {kind: 'nack'; sourceAddress: number; targetAddress: number; code: number; previous: Buffer};

/** Receiver of diagnostic payloads, see {@link DoipConnection.subscribe}. */
export type DiagnosticListener = {
    onPayload: (payload: Buffer) => void;
    onLinkDown: (error: Error) => void;
};

/**
 * Typed event map emitted by {@link DoipConnection}.
 */
export interface DoipConnectionEvents {
    /** TCP (or TLS) link established, routing not yet active. */
    connect: [];
    routingActivated: [response: DoipRoutingActivationResponse];
    disconnect: [hadError: boolean];
    reconnecting: [attempt: number, delayMs: number];
    stateChange: [state: DoipConnectionState];
    /** Every frame read from or written to the socket. */
    frame: [direction: 'in' | 'out', frame: DoipFrame];
    diagnostic: [event: DiagnosticEvent];
    /** Diagnostic traffic for another source/target pair. */
    ignored: [message: DoipDiagnosticMessage | DoipDiagnosticAck];
    /** An alive check request was answered. */
    aliveCheck: [];
    invalidated: [reason: string];
    error: [error: Error];
}

type Waiter = {
    accept: (message: DoipMessage) => boolean;
    reject: (error: Error) => void;
    timeoutId: NodeJS.Timeout;
};

const toDiagnosticEvent = (message: DoipMessage): DiagnosticEvent | undefined => {
    switch (message.type) {
        case DoipPayloadType.DiagnosticMessage:
            return {
                kind: 'message',
                sourceAddress: message.sourceAddress,
                targetAddress: message.targetAddress,
                userData: message.userData,
            };
        case DoipPayloadType.DiagnosticMessageAck:
            return {
                kind: 'ack',
                sourceAddress: message.sourceAddress,
                targetAddress: message.targetAddress,
                code: message.code,
                previous: message.previous,
            };
        case DoipPayloadType.DiagnosticMessageNack:
            return {
                kind: 'nack',
                sourceAddress: message.sourceAddress,
                targetAddress: message.targetAddress,
                code: message.code,
                previous: message.previous,
            };
        default:
            return undefined;
    }
};

const hex16 = (value: number): string => `0x${value.toString(16).padStart(4, '0').toUpperCase()}`;

/**
 * DoIP client connection to one entity: routing activation, diagnostic
 * message exchange, alive check answers and optional reconnect.
 */
export class DoipConnection extends EventEmitter<DoipConnectionEvents> {
    private readonly host: string;
    private readonly port: number;
    private readonly transport: 'tcp' | 'tls';
    private readonly tlsOptions: Omit<TlsConnectionOptions, 'host' | 'port'>;
    private readonly requireTlsAuthorization: boolean;
    private readonly testerAddress: number;
    private readonly configuredEcuAddress: number | null;
    private readonly activationType: number;
    private readonly activationOemData?: Buffer;
    private readonly protocolVersion: number;
    private readonly routingActivationTimeoutMs: number;
    private readonly diagnosticAckTimeoutMs: number;
    private readonly waitForDiagnosticAck: boolean;
    private readonly autoReconnect: boolean;
    private readonly reconnectDelayMs: number;
    private readonly reconnectMaxDelayMs: number;
    private readonly maxBufferBytes: number;

    private socket: Socket | null = null;
    private streamBuffer: Buffer = Buffer.alloc(0);
    private state: DoipConnectionState = 'disconnected';
    private connectPromise: Promise<void> | null = null;
    private manualClose = false;
    private invalidatedReason: string | null = null;
    private reconnectAttempts = 0;
    private reconnectTimer: NodeJS.Timeout | null = null;
    private waiters: Waiter[] = [];
    private diagnosticListeners: DiagnosticListener[] = [];
    private entityAddress: number | null = null;
    private ecuAddress: number | null;

    constructor(private readonly options: DoipConnectionOptions) {
        super();
        this.host = options.host;
        this.transport = options.transport ?? 'tcp';
        this.port = options.port ?? (this.transport === 'tls' ? DOIP_DEFAULT_TLS_PORT : DOIP_DEFAULT_PORT);
        this.tlsOptions = options.tls ?? {};
        this.requireTlsAuthorization = options.requireTlsAuthorization ?? this.transport === 'tls';
        this.testerAddress = assertLogicalAddress(options.testerAddress ?? DOIP_DEFAULT_TESTER_ADDRESS, 'tester address');
        this.configuredEcuAddress = options.ecuAddress === undefined
            ? null
            : assertLogicalAddress(options.ecuAddress, 'ECU address');
        this.ecuAddress = this.configuredEcuAddress;
        this.activationType = options.activationType ?? DoipRoutingActivationType.Default;
        if (options.activationOemData && options.activationOemData.length !== 4) {
            throw new RangeError(`Routing activation OEM data must be 4 bytes, got ${options.activationOemData.length}`);
        }
        this.activationOemData = options.activationOemData;
        this.protocolVersion = options.protocolVersion ?? DOIP_DEFAULT_PROTOCOL_VERSION;
        this.routingActivationTimeoutMs = options.routingActivationTimeoutMs ?? DOIP_DEFAULT_ROUTING_ACTIVATION_TIMEOUT_MS;
        this.diagnosticAckTimeoutMs = options.diagnosticAckTimeoutMs ?? DOIP_DEFAULT_DIAGNOSTIC_ACK_TIMEOUT_MS;
        this.waitForDiagnosticAck = options.waitForDiagnosticAck ?? true;
        this.autoReconnect = options.autoReconnect ?? false;
        this.reconnectDelayMs = options.reconnectDelayMs ?? DOIP_DEFAULT_RECONNECT_DELAY_MS;
        this.reconnectMaxDelayMs = options.reconnectMaxDelayMs ?? DOIP_DEFAULT_RECONNECT_MAX_DELAY_MS;
        this.maxBufferBytes = options.maxBufferBytes ?? DOIP_DEFAULT_MAX_BUFFER_BYTES;

        for (const [label, value] of [
            ['routingActivationTimeoutMs', this.routingActivationTimeoutMs],
            ['diagnosticAckTimeoutMs', this.diagnosticAckTimeoutMs],
        ] as const) {
            if (!Number.isFinite(value) || value <= 0) {
                throw new RangeError(`DoIP ${label} must be a positive number, got ${value}`);
            }
        }
    }

    /** Create a connection and bring it to the `active` state. */
    public static async open(options: DoipConnectionOptions): Promise<DoipConnection> {
        const connection = new DoipConnection(options);
        await connection.connect();
        return connection;
    }

    /**
     * Opens the socket and performs routing activation.
     *
     * Rejects with `DoipError(ROUTING_ACTIVATION_DENIED)` when the entity
     * refuses routing, `TIMEOUT` when it does not answer and `LINK_DOWN`
     * when the socket cannot be opened. The socket is released on failure.
     */
    public async connect(): Promise<void> {
        if (this.state === 'active' && this.isConnected()) return;
        if (this.connectPromise) return this.connectPromise;

        this.manualClose = false;
        this.invalidatedReason = null;
        this.connectPromise = this.connectInternal();
        try {
            await this.connectPromise;
        } finally {
            this.connectPromise = null;
        }
    }

    /** Tears the link down and walks connect + routing activation again. */
    public async reconnect(): Promise<void> {
        this.stopReconnectTimer();
        this.manualClose = true;
        this.releaseSocket(doipLinkDown('DoIP connection is reconnecting'));
        await this.connect();
    }

    /**
     * Releases the socket. Pending receives and acks reject with `LINK_DOWN`.
     */
    public close(): void {
        this.manualClose = true;
        this.stopReconnectTimer();
        this.releaseSocket(doipLinkDown('DoIP connection closed'));
    }

    /**
     * Marks the handle unusable, e.g. after an ECU reset. The socket is
     * released and sends fail with `LINK_DOWN` until {@link reconnect}.
     */
    public invalidate(reason: string): void {
        if (this.invalidatedReason !== null) return;
        this.invalidatedReason = reason;
        this.stopReconnectTimer();
        this.emit('invalidated', reason);
        this.releaseSocket(doipLinkDown(`DoIP connection invalidated: ${reason}`, {reason}));
    }

    /** Returns `true` when the underlying socket is open. */
    public isConnected(): boolean {
        return !!this.socket && !this.socket.destroyed;
    }

    public isInvalidated(): boolean {
        return this.invalidatedReason !== null;
    }

    public getState(): DoipConnectionState {
        return this.state;
    }

    public getTesterAddress(): number {
        return this.testerAddress;
    }

    /** Logical address diagnostic messages are sent to, once known. */
    public getEcuAddress(): number | null {
        return this.ecuAddress;
    }

    /** Entity address reported by the last routing activation response. */
    public getEntityAddress(): number | null {
        return this.entityAddress;
    }

    /**
     * Sends one diagnostic message (tester -> ECU).
     *
     * Unless disabled, resolves after the entity's diagnostic ack and rejects
     * with `DoipError(DIAGNOSTIC_MESSAGE_NACK)` on a nack.
     */
    public async sendDiagnostic(
        payload: Buffer | Uint8Array,
        options: {waitForAck?: boolean; timeoutMs?: number} = {},
    ): Promise<void> {
        this.assertUsable();
        const ecuAddress = this.ecuAddress;
        if (this.state !== 'active' || ecuAddress === null) {
            throw doipLinkDown(`DoIP routing is not active (state ${this.state})`, {state: this.state});
        }
        const message: DoipDiagnosticMessage = {
            type: DoipPayloadType.DiagnosticMessage,
            sourceAddress: this.testerAddress,
            targetAddress: ecuAddress,
            userData: Buffer.from(payload),
        };

        if (!(options.waitForAck ?? this.waitForDiagnosticAck)) {
            await this.writeMessage(message);
            return;
        }

        const timeoutMs = options.timeoutMs ?? this.diagnosticAckTimeoutMs;
        const result = await this.writeAndWait(message, (inbound) => {
            const event = this.isOwnDiagnostic(inbound) ? toDiagnosticEvent(inbound) : undefined;
            return event && event.kind !== 'message' ? event : undefined;
        }, timeoutMs, `DoIP diagnostic message ack timed out after ${timeoutMs}ms`);
        if (result.kind === 'nack') {
            throw diagnosticNackError(result.code, {
                sourceAddress: result.sourceAddress,
                targetAddress: result.targetAddress,
            });
        }
    }

    /**
     * Waits for the next diagnostic message, ack or nack from the ECU.
     */
    public receiveDiagnostic(timeoutMs = this.diagnosticAckTimeoutMs): Promise<DiagnosticEvent> {
        try {
            this.assertUsable();
        } catch (err) {
            return Promise.reject(err);
        }
        return this.waitFor(
            (message) => (this.isOwnDiagnostic(message) ? toDiagnosticEvent(message) : undefined),
            timeoutMs,
            `No DoIP diagnostic message received within ${timeoutMs}ms`,
        );
    }

    /**
     * Registers a receiver for diagnostic payloads from the ECU.
     * Returns the unsubscribe function.
     */
    public subscribe(listener: DiagnosticListener): () => void {
        this.diagnosticListeners.push(listener);
        return () => {
            this.diagnosticListeners = this.diagnosticListeners.filter((entry) => entry !== listener);
        };
    }

    /** UDS transport entry point; same as {@link sendDiagnostic}. */
    public send(payload: Buffer): Promise<void> {
        return this.sendDiagnostic(payload);
    }

    private async connectInternal(): Promise<void> {
        this.releaseSocket(doipLinkDown('DoIP connection is reconnecting'));
        const tlsSocket = this.transport === 'tls'
            ? tls.connect({
                ...this.tlsOptions,
                host: this.host,
                port: this.port,
                servername: this.tlsOptions.servername ?? this.host,
                rejectUnauthorized: this.tlsOptions.rejectUnauthorized ?? this.requireTlsAuthorization,
            })
            : null;
        const socket: Socket = tlsSocket ?? net.createConnection({
            host: this.host,
            port: this.port,
            localAddress: this.options.localAddress,
        });
        this.socket = socket;
        this.streamBuffer = Buffer.alloc(0);

        socket.on('data', (chunk: Buffer) => this.handleData(socket, chunk));
        socket.on('error', (err) => {
            this.reportError(this.wrapProtocolError(err));
        });
        socket.on('close', (hadError) => {
            this.detach(socket, doipLinkDown('DoIP connection closed by peer', {hadError}), hadError);
        });

        try {
            await new Promise<void>((resolve, reject) => {
                const onError = (err: Error): void => {
                    reject(doipLinkDown(`DoIP connection to ${this.host}:${this.port} failed: ${err.message}`, {
                        host: this.host,
                        port: this.port,
                    }));
                };
                socket.once('error', onError);
                socket.once(this.transport === 'tls' ? 'secureConnect' : 'connect', () => {
                    socket.off('error', onError);
                    resolve();
                });
            });

            if (tlsSocket && this.requireTlsAuthorization && !tlsSocket.authorized) {
                throw new DoipError({
                    message: `TLS peer authorization failed: ${tlsSocket.authorizationError ?? 'unknown reason'}`,
                    domain: 'transport',
                    code: 'LINK_DOWN',
                });
            }
            this.setState('tcp_connected');
            this.emit('connect');
            await this.activateRouting();
        } catch (err) {
            this.releaseSocket(doipLinkDown('DoIP connection setup failed'));
            throw err;
        }

        this.reconnectAttempts = 0;
    }

    private async activateRouting(): Promise<void> {
        this.setState('routing_activation');
        const timeoutMs = this.routingActivationTimeoutMs;
        const result = await this.writeAndWait(
            {
                type: DoipPayloadType.RoutingActivationRequest,
                sourceAddress: this.testerAddress,
                activationType: this.activationType,
                oem: this.activationOemData,
            },
            (message) => (message.type === DoipPayloadType.RoutingActivationResponse ? message : undefined),
            timeoutMs,
            `DoIP routing activation timed out after ${timeoutMs}ms`,
        );

        if (result.code !== DoipRoutingActivationCode.Success) {
            throw mapRoutingActivationCodeToError(result.code, {
                testerAddress: result.testerAddress,
                entityAddress: result.entityAddress,
            });
        }
        this.entityAddress = result.entityAddress;
        this.ecuAddress = this.configuredEcuAddress ?? result.entityAddress;
        this.setState('active');
        this.emit('routingActivated', result);
    }

    private handleData(socket: Socket, chunk: Buffer): void {
        if (socket !== this.socket) return;
        this.streamBuffer = Buffer.concat([this.streamBuffer, chunk]);
        let extracted: ReturnType<typeof extractDoipFrames>;
        try {
            if (this.streamBuffer.length > this.maxBufferBytes) {
                throw new DoipError({
                    message: `DoIP stream buffer exceeded ${this.maxBufferBytes} bytes (possible framing corruption)`,
                    domain: 'frame',
                    code: 'MALFORMED_FRAME',
                });
            }
            extracted = extractDoipFrames(this.streamBuffer, this.maxBufferBytes);
        } catch (err) {
            const error = this.wrapProtocolError(err);
            this.reportError(error);
            this.releaseSocket(error, true);
            return;
        }
        this.streamBuffer = extracted.remainder;

        for (const rejected of extracted.rejected) this.reportError(rejected);
        for (const frame of extracted.frames) {
            this.emit('frame', 'in', frame);
            try {
                this.handleMessage(decodeDoipFramePayload(frame));
            } catch (err) {
                this.reportError(this.wrapProtocolError(err));
            }
        }
    }

    private handleMessage(message: DoipMessage): void {
        switch (message.type) {
            case DoipPayloadType.AliveCheckRequest:
                this.writeMessage({type: DoipPayloadType.AliveCheckResponse, sourceAddress: this.testerAddress})
                    .then(() => {
                        this.emit('aliveCheck');
                    })
                    .catch((err) => {
                        this.reportError(this.wrapProtocolError(err));
                    });
                return;
            case DoipPayloadType.GenericNack: {
                const error = genericNackError(message.code);
                this.rejectAllWaiters(error);
                this.reportError(error);
                return;
            }
            case DoipPayloadType.DiagnosticMessage:
            case DoipPayloadType.DiagnosticMessageAck:
            case DoipPayloadType.DiagnosticMessageNack: {
                const event = toDiagnosticEvent(message);
                if (!event || !this.isOwnDiagnostic(message)) {
                    this.emit('ignored', message);
                    return;
                }
                this.emit('diagnostic', event);
                this.resolveWaiters(message);
                if (event.kind === 'message') {
                    for (const listener of [...this.diagnosticListeners]) listener.onPayload(event.userData);
                }
                return;
            }
            default:
                this.resolveWaiters(message);
        }
    }

    private isOwnDiagnostic(message: DoipMessage): boolean {
        if (
            message.type !== DoipPayloadType.DiagnosticMessage
            && message.type !== DoipPayloadType.DiagnosticMessageAck
            && message.type !== DoipPayloadType.DiagnosticMessageNack
        ) {
            return false;
        }
        return message.sourceAddress === this.ecuAddress && message.targetAddress === this.testerAddress;
    }

    private assertUsable(): void {
        if (this.invalidatedReason !== null) {
            throw doipLinkDown(`DoIP connection invalidated: ${this.invalidatedReason}`, {reason: this.invalidatedReason});
        }
        if (!this.isConnected()) {
            throw doipLinkDown(`DoIP connection to ${this.host}:${this.port} is not open`);
        }
    }

    private async writeMessage(message: DoipMessage): Promise<void> {
        const socket = this.socket;
        if (!socket || socket.destroyed) {
            throw doipLinkDown(`DoIP connection to ${this.host}:${this.port} is not open`);
        }
        const payload = encodeDoipMessage(message);
        const packet = encodeDoipFrame(message.type, payload, this.protocolVersion);
        await new Promise<void>((resolve, reject) => {
            socket.write(packet, (err) => {
                if (err) reject(doipLinkDown(`DoIP write failed: ${err.message}`));
                else resolve();
            });
        });
        this.emit('frame', 'out', {
            protocolVersion: this.protocolVersion,
            inverseVersion: this.protocolVersion ^ 0xff,
            payloadType: message.type,
            payloadLength: payload.length,
            payload,
        });
    }

    /**
     * Writes `message` and waits for the reply picked by `select`. A failed
     * write withdraws the waiter and its timer.
     */
    private async writeAndWait<T>(
        message: DoipMessage,
        select: (message: DoipMessage) => T | undefined,
        timeoutMs: number,
        timeoutMessage: string,
    ): Promise<T> {
        const cancel = new AbortController();
        const reply = this.waitFor(select, timeoutMs, timeoutMessage, cancel.signal);
        const written = this.writeMessage(message).catch((err: unknown) => {
            cancel.abort();
            throw err;
        });
        const [, value] = await Promise.all([written, reply]);
        return value;
    }

    private waitFor<T>(
        select: (message: DoipMessage) => T | undefined,
        timeoutMs: number,
        timeoutMessage: string,
        signal?: AbortSignal,
    ): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const withdraw = (): void => {
                clearTimeout(waiter.timeoutId);
                this.waiters = this.waiters.filter((entry) => entry !== waiter);
                signal?.removeEventListener('abort', onAbort);
            };
            const onAbort = (): void => {
                withdraw();
                reject(doipLinkDown('DoIP wait cancelled'));
            };
            const waiter: Waiter = {
                accept: (message) => {
                    const value = select(message);
                    if (value === undefined) return false;
                    signal?.removeEventListener('abort', onAbort);
                    resolve(value);
                    return true;
                },
                reject: (error) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(error);
                },
                timeoutId: setTimeout(() => {
                    withdraw();
                    reject(doipTimeout(timeoutMessage, {timeoutMs}));
                }, timeoutMs),
            };
            this.waiters.push(waiter);
            signal?.addEventListener('abort', onAbort, {once: true});
        });
    }

    private resolveWaiters(message: DoipMessage): void {
        const pending = this.waiters;
        this.waiters = [];
        for (const waiter of pending) {
            if (waiter.accept(message)) clearTimeout(waiter.timeoutId);
            else this.waiters.push(waiter);
        }
    }

    private rejectAllWaiters(error: Error): void {
        const waiters = this.waiters.splice(0, this.waiters.length);
        for (const waiter of waiters) {
            clearTimeout(waiter.timeoutId);
            waiter.reject(error);
        }
    }

    private releaseSocket(error: Error, hadError = false): void {
        const socket = this.socket;
        if (!socket) return;
        this.detach(socket, error, hadError);
        socket.destroy();
    }

    private detach(socket: Socket, error: Error, hadError: boolean): void {
        if (socket !== this.socket) return;
        const wasActive = this.state === 'active';
        this.socket = null;
        this.streamBuffer = Buffer.alloc(0);
        this.setState('disconnected');
        this.rejectAllWaiters(error);
        for (const listener of [...this.diagnosticListeners]) listener.onLinkDown(error);
        this.emit('disconnect', hadError);
        if (wasActive && !this.manualClose && this.invalidatedReason === null && this.autoReconnect) {
            this.scheduleReconnect();
        }
    }

    private scheduleReconnect(): void {
        if (this.reconnectTimer) return;
        this.reconnectAttempts += 1;
        const delayMs = Math.min(this.reconnectDelayMs * (2 ** (this.reconnectAttempts - 1)), this.reconnectMaxDelayMs);
        this.emit('reconnecting', this.reconnectAttempts, delayMs);
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            this.connect().catch((err) => {
                this.reportError(this.wrapProtocolError(err));
                if (!this.manualClose && this.invalidatedReason === null) this.scheduleReconnect();
            });
        }, delayMs);
    }

    private stopReconnectTimer(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
    }

    private setState(next: DoipConnectionState): void {
        if (next === this.state) return;
        this.state = next;
        this.emit('stateChange', next);
    }

    /** Errors that also reject a pending operation are only emitted when observed. */
    private reportError(error: Error): void {
        if (this.listenerCount('error') > 0) this.emit('error', error);
    }

    private wrapProtocolError(err: unknown): DoipError {
        if (err instanceof DoipError) return err;
        const message = err instanceof Error ? err.message : String(err);
        return new DoipError({
            message,
            domain: 'transport',
            code: 'PROTOCOL_ERROR',
            details: {host: this.host, port: this.port, ecuAddress: this.ecuAddress === null ? null : hex16(this.ecuAddress)},
        });
    }
}

/**
 * Opens a connection for the duration of `fn` and always closes it.
 */
export const withDoipConnection = async <T>(
    options: DoipConnectionOptions,
    fn: (connection: DoipConnection) => Promise<T> | T,
): Promise<T> => {
    const connection = await DoipConnection.open(options);
    try {
        return await fn(connection);
    } finally {
        connection.close();
    }
};
