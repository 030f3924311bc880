/**
 * DoIP vehicle discovery over UDP.
 * @module doip/discovery
 *
 * Standard reference:
 * - ISO 13400-2:2012, clause 7.4 (vehicle identification, announcement)
 */
import {createSocket, type RemoteInfo, type Socket} from 'dgram';
import {EventEmitter} from 'events';

import {
    DOIP_BROADCAST_ADDRESS,
    DOIP_DEFAULT_DISCOVERY_TIMEOUT_MS,
    DOIP_DEFAULT_PORT,
    DOIP_DEFAULT_PROTOCOL_VERSION,
    DOIP_EID_LENGTH,
    DOIP_VIN_LENGTH,
    DoipPayloadType,
} from './constants';
import {DoipError, doipTimeout} from './errors';
import {
    decodeDoipPacket,
    encodeDoipPacket,
    type DoipEntityStatusResponse,
    type DoipMessage,
    type DoipVehicleAnnouncement,
} from './messages';

const cancelledWait = (): DoipError => new DoipError({
    message: 'DoIP discovery wait cancelled',
    domain: 'discovery',
    code: 'LINK_DOWN',
});

export type DoipDiscoveryOptions = {
    /** UDP destination port for requests. Defaults to 13400. */
    port?: number;
    /** Local bind address. */
    bindAddress?: string;
    /**
     * Local UDP port. Defaults to an ephemeral port, which receives answers
     * to requests; bind 13400 to also hear unsolicited announcements.
     */
    bindPort?: number;
    /** TCP port reported for discovered vehicles. Defaults to 13400. */
    tcpPort?: number;
    /** Protocol version written into request headers. */
    protocolVersion?: number;
    /** Default wait window for requests. */
    timeoutMs?: number;
};

/** A DoIP entity that answered or announced itself. */
export type DiscoveredVehicle = {
    ip: string;
    port: number;
    logicalAddress: number;
    announcement: DoipVehicleAnnouncement;
};

export interface DoipDiscoveryEvents {
    /** Emitted for each valid vehicle announcement / identification response. */
    announcement: [vehicle: DiscoveredVehicle];
    /** Emitted for every decoded datagram. */
    packet: [message: DoipMessage, remote: RemoteInfo];
    /** Socket-level and decode errors. */
    error: [error: Error];
}

/** Discovers DoIP entities and queries their status over UDP. */
export class DoipDiscovery extends EventEmitter<DoipDiscoveryEvents> {
    private readonly socket: Socket;
    private readonly port: number;
    private readonly tcpPort: number;
    private readonly protocolVersion: number;
    private readonly timeoutMs: number;
    private bindPromise: Promise<void> | null = null;
    private closed = false;

    constructor(private readonly options: DoipDiscoveryOptions = {}) {
        super();
        this.port = options.port ?? DOIP_DEFAULT_PORT;
        this.tcpPort = options.tcpPort ?? DOIP_DEFAULT_PORT;
        this.protocolVersion = options.protocolVersion ?? DOIP_DEFAULT_PROTOCOL_VERSION;
        this.timeoutMs = options.timeoutMs ?? DOIP_DEFAULT_DISCOVERY_TIMEOUT_MS;
        this.socket = createSocket({type: 'udp4', reuseAddr: true});
        this.socket.on('error', (err) => this.reportError(err));
        this.socket.on('message', (msg, rinfo) => this.handleDatagram(msg, rinfo));
    }

    /**
     * One-shot {@link discover} on a socket that is opened and closed here.
     */
    public static async discoverVehicle(
        options: DoipDiscoveryOptions & {broadcastTarget?: string} = {},
    ): Promise<DiscoveredVehicle> {
        const discovery = new DoipDiscovery(options);
        try {
            return await discovery.discover(options.broadcastTarget, options.timeoutMs);
        } finally {
            discovery.close();
        }
    }

    /**
     * Sends a vehicle identification request and resolves with the first
     * valid announcement. Rejects with `DoipError(TIMEOUT)` when none arrives.
     */
    public async discover(
        broadcastTarget = DOIP_BROADCAST_ADDRESS,
        timeoutMs = this.timeoutMs,
    ): Promise<DiscoveredVehicle> {
        await this.bind();
        return this.sendAndWait({type: DoipPayloadType.VehicleIdentificationRequest}, broadcastTarget, (signal) => (
            this.waitForAnnouncement(() => true, timeoutMs, signal)
        ));
    }

    /** Identification request filtered by entity ID (6 bytes). */
    public async discoverByEid(
        eid: Buffer,
        broadcastTarget = DOIP_BROADCAST_ADDRESS,
        timeoutMs = this.timeoutMs,
    ): Promise<DiscoveredVehicle> {
        if (eid.length !== DOIP_EID_LENGTH) {
            throw new RangeError(`DoIP EID must be ${DOIP_EID_LENGTH} bytes, got ${eid.length}`);
        }
        await this.bind();
        return this.sendAndWait({type: DoipPayloadType.VehicleIdentificationRequestWithEid, eid}, broadcastTarget, (signal) => (
            this.waitForAnnouncement((vehicle) => vehicle.announcement.eid.equals(eid), timeoutMs, signal)
        ));
    }

    /** Identification request filtered by VIN. */
    public async discoverByVin(
        vin: string,
        broadcastTarget = DOIP_BROADCAST_ADDRESS,
        timeoutMs = this.timeoutMs,
    ): Promise<DiscoveredVehicle> {
        if (Buffer.byteLength(vin, 'ascii') !== DOIP_VIN_LENGTH) {
            throw new RangeError(`VIN must be ${DOIP_VIN_LENGTH} ASCII characters, got ${vin.length}`);
        }
        await this.bind();
        return this.sendAndWait({type: DoipPayloadType.VehicleIdentificationRequestWithVin, vin}, broadcastTarget, (signal) => (
            this.waitForAnnouncement((vehicle) => vehicle.announcement.vin === vin, timeoutMs, signal)
        ));
    }

    /**
     * Send an identification request and collect every distinct answer
     * within the window.
     */
    public async collect(
        broadcastTarget = DOIP_BROADCAST_ADDRESS,
        timeoutMs = this.timeoutMs,
    ): Promise<DiscoveredVehicle[]> {
        await this.bind();
        const vehicles = new Map<string, DiscoveredVehicle>();
        const handler = (vehicle: DiscoveredVehicle): void => {
            vehicles.set(`${vehicle.ip}/${vehicle.logicalAddress}`, vehicle);
        };
        this.on('announcement', handler);
        try {
            await this.sendMessage({type: DoipPayloadType.VehicleIdentificationRequest}, broadcastTarget);
            await new Promise((resolve) => setTimeout(resolve, timeoutMs));
        } finally {
            this.off('announcement', handler);
        }
        return Array.from(vehicles.values());
    }

    /**
     * Wait for an announcement without sending a request (vehicles announce
     * themselves after power-up).
     */
    public async awaitAnnouncement(
        timeoutMs = this.timeoutMs,
        filter: (vehicle: DiscoveredVehicle) => boolean = () => true,
    ): Promise<DiscoveredVehicle> {
        await this.bind();
        return this.waitForAnnouncement(filter, timeoutMs);
    }

    /** Queries node type and socket usage of one entity. */
    public async requestEntityStatus(host: string, timeoutMs = this.timeoutMs): Promise<DoipEntityStatusResponse> {
        await this.bind();
        return this.sendAndWait({type: DoipPayloadType.EntityStatusRequest}, host, (signal) => this.waitForPacket(
            (message, remote) => (message.type === DoipPayloadType.EntityStatusResponse && remote.address === host
                ? message
                : undefined),
            timeoutMs,
            `No DoIP entity status response from ${host} within ${timeoutMs}ms`,
            signal,
        ));
    }

    /** Queries the diagnostic power mode of one entity. */
    public async requestPowerMode(host: string, timeoutMs = this.timeoutMs): Promise<number> {
        await this.bind();
        return this.sendAndWait({type: DoipPayloadType.DiagnosticPowerModeRequest}, host, (signal) => this.waitForPacket(
            (message, remote) => (message.type === DoipPayloadType.DiagnosticPowerModeResponse && remote.address === host
                ? message.powerMode
                : undefined),
            timeoutMs,
            `No DoIP power mode response from ${host} within ${timeoutMs}ms`,
            signal,
        ));
    }

    /** Encodes and sends one message without waiting for replies. */
    public async sendMessage(message: DoipMessage, host: string): Promise<void> {
        await this.bind();
        const packet = encodeDoipPacket(message, this.protocolVersion);
        await new Promise<void>((resolve, reject) => {
            this.socket.send(packet, this.port, host, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    /**
     * Close the UDP socket.
     */
    public close(): void {
        if (this.closed) return;
        this.closed = true;
        this.socket.close();
    }

    private bind(): Promise<void> {
        if (this.closed) {
            return Promise.reject(new DoipError({
                message: 'DoIP discovery socket is closed',
                domain: 'discovery',
                code: 'LINK_DOWN',
            }));
        }
        if (!this.bindPromise) {
            this.bindPromise = new Promise<void>((resolve, reject) => {
                const onError = (err: Error): void => reject(err);
                this.socket.once('error', onError);
                this.socket.bind({address: this.options.bindAddress, port: this.options.bindPort ?? 0}, () => {
                    this.socket.off('error', onError);
                    this.socket.setBroadcast(true);
                    resolve();
                });
            });
        }
        return this.bindPromise;
    }

    /**
     * Registers the reply waiter, then sends. A failed send withdraws the
     * waiter and its timer.
     */
    private async sendAndWait<T>(
        message: DoipMessage,
        host: string,
        wait: (signal: AbortSignal) => Promise<T>,
    ): Promise<T> {
        const cancel = new AbortController();
        const reply = wait(cancel.signal);
        const sent = this.sendMessage(message, host).catch((err: unknown) => {
            cancel.abort();
            throw err;
        });
        const [, value] = await Promise.all([sent, reply]);
        return value;
    }

    private waitForAnnouncement(
        filter: (vehicle: DiscoveredVehicle) => boolean,
        timeoutMs: number,
        signal?: AbortSignal,
    ): Promise<DiscoveredVehicle> {
        return new Promise<DiscoveredVehicle>((resolve, reject) => {
            const cleanup = (): void => {
                clearTimeout(timeoutId);
                this.off('announcement', handler);
                signal?.removeEventListener('abort', onAbort);
            };
            const handler = (vehicle: DiscoveredVehicle): void => {
                if (!filter(vehicle)) return;
                cleanup();
                resolve(vehicle);
            };
            const onAbort = (): void => {
                cleanup();
                reject(cancelledWait());
            };
            const timeoutId = setTimeout(() => {
                cleanup();
                reject(doipTimeout(`No DoIP vehicle announcement received within ${timeoutMs}ms`, {timeoutMs}));
            }, timeoutMs);
            this.on('announcement', handler);
            signal?.addEventListener('abort', onAbort, {once: true});
        });
    }

    private waitForPacket<T>(
        select: (message: DoipMessage, remote: RemoteInfo) => T | undefined,
        timeoutMs: number,
        timeoutMessage: string,
        signal?: AbortSignal,
    ): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const cleanup = (): void => {
                clearTimeout(timeoutId);
                this.off('packet', handler);
                signal?.removeEventListener('abort', onAbort);
            };
            const handler = (message: DoipMessage, remote: RemoteInfo): void => {
                const value = select(message, remote);
                if (value === undefined) return;
                cleanup();
                resolve(value);
            };
            const onAbort = (): void => {
                cleanup();
                reject(cancelledWait());
            };
            const timeoutId = setTimeout(() => {
                cleanup();
                reject(doipTimeout(timeoutMessage, {timeoutMs}));
            }, timeoutMs);
            this.on('packet', handler);
            signal?.addEventListener('abort', onAbort, {once: true});
        });
    }

    private handleDatagram(msg: Buffer, remote: RemoteInfo): void {
        let message: DoipMessage;
        try {
            message = decodeDoipPacket(msg).message;
        } catch (err) {
            this.reportError(err instanceof Error ? err : new Error(String(err)));
            return;
        }
        this.emit('packet', message, remote);
        if (message.type === DoipPayloadType.VehicleIdentificationResponse) {
            this.emit('announcement', {
                ip: remote.address,
                port: this.tcpPort,
                logicalAddress: message.logicalAddress,
                announcement: message,
            });
        }
    }

    /** Datagrams from other senders on a shared port are only reported when observed. */
    private reportError(error: Error): void {
        if (this.listenerCount('error') > 0) this.emit('error', error);
    }
}
