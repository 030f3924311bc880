/**
 * UDS exchange state machine: one outstanding request, response-pending
 * handling, diagnostic session and security tracking.
 * @module uds/session
 *
 * The session performs no I/O. The owner sends the payload returned by
 * {@link UdsSession.submit} and feeds inbound bytes to {@link UdsSession.receive}.
 */
import {EventEmitter} from 'events';

import {
    DiagnosticSession,
    UDS_DEFAULT_MAX_RESPONSE_PENDING_EXTENSIONS,
    UDS_DEFAULT_REQUEST_TIMEOUT_MS,
    UDS_DEFAULT_RESPONSE_PENDING_TIMEOUT_MS,
    UdsNrc,
    UdsService,
    serviceName,
} from './constants';
import {decodeUdsResponse, encodeUdsRequest, type UdsRequest, type UdsResponse} from './codec';
import {UdsError} from './errors';

export type UdsSessionState = 'idle' | 'awaiting_response' | 'response_pending_wait';

export type SecurityState =
    | {status: 'locked'}
    | {status: 'seedIssued'; level: number}
    | {status: 'unlocked'; level: number};

export type UdsSessionOptions = {
    /** P2 client timeout for the first response. */
    requestTimeoutMs?: number;
    /** P2* client timeout after each response-pending. */
    responsePendingTimeoutMs?: number;
    maxResponsePendingExtensions?: number;
};

export type UdsExchange = {
    /** Encoded request to hand to the transport. */
    payload: Buffer;
    /** Settles with the final response; negative responses resolve as values. */
    response: Promise<UdsResponse>;
};

export interface UdsSessionEvents {
    stateChange: [state: UdsSessionState];
    sessionChange: [session: DiagnosticSession];
    securityChange: [security: SecurityState];
    /** NRC 0x78 received; `extension` counts from 1. */
    responsePending: [serviceId: number, extension: number];
    /** Bytes received while no exchange was outstanding. */
    unsolicited: [payload: Buffer];
    /** A positive ECUReset response was received; emitted once the exchange has settled. */
    ecuReset: [resetType: number];
}

type PendingExchange = {
    request: UdsRequest;
    serviceId: number;
    extensions: number;
    timer: NodeJS.Timeout;
    resolve: (response: UdsResponse) => void;
    reject: (error: Error) => void;
};

const positiveDuration = (value: number, label: string): number => {
    if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`UDS ${label} must be a positive number, got ${value}`);
    }
    return value;
};

export class UdsSession extends EventEmitter<UdsSessionEvents> {
    private readonly requestTimeoutMs: number;
    private readonly responsePendingTimeoutMs: number;
    private readonly maxResponsePendingExtensions: number;

    private state: UdsSessionState = 'idle';
    private pending: PendingExchange | null = null;
    private session: DiagnosticSession = DiagnosticSession.Default;
    private security: SecurityState = {status: 'locked'};

    constructor(options: UdsSessionOptions = {}) {
        super();
        this.requestTimeoutMs = positiveDuration(options.requestTimeoutMs ?? UDS_DEFAULT_REQUEST_TIMEOUT_MS, 'requestTimeoutMs');
        this.responsePendingTimeoutMs = positiveDuration(
            options.responsePendingTimeoutMs ?? UDS_DEFAULT_RESPONSE_PENDING_TIMEOUT_MS,
            'responsePendingTimeoutMs',
        );
        this.maxResponsePendingExtensions = options.maxResponsePendingExtensions ?? UDS_DEFAULT_MAX_RESPONSE_PENDING_EXTENSIONS;
        if (!Number.isInteger(this.maxResponsePendingExtensions) || this.maxResponsePendingExtensions < 0) {
            throw new RangeError(`UDS maxResponsePendingExtensions must be a non-negative integer, got ${this.maxResponsePendingExtensions}`);
        }
    }

    public getState(): UdsSessionState {
        return this.state;
    }

    public isIdle(): boolean {
        return this.state === 'idle';
    }

    public getSession(): DiagnosticSession {
        return this.session;
    }

    public getSecurityState(): SecurityState {
        return {...this.security};
    }

    /**
     * Starts an exchange. Throws `UdsError(EXCHANGE_IN_PROGRESS)` while another
     * exchange is outstanding; the outstanding exchange is left untouched.
     */
    public submit(request: UdsRequest): UdsExchange {
        if (this.pending) {
            throw new UdsError({
                message: `Cannot send ${serviceName(request.serviceId)}: ${serviceName(this.pending.serviceId)} is still awaiting its response`,
                domain: 'session',
                code: 'EXCHANGE_IN_PROGRESS',
                serviceId: request.serviceId,
                details: {pendingServiceId: this.pending.serviceId},
            });
        }
        const payload = encodeUdsRequest(request);
        const response = new Promise<UdsResponse>((resolve, reject) => {
            this.pending = {
                request,
                serviceId: request.serviceId,
                extensions: 0,
                timer: this.startTimer(this.requestTimeoutMs),
                resolve,
                reject,
            };
        });
        this.setState('awaiting_response');
        return {payload, response};
    }

    /**
     * Feeds one inbound UDS message.
     */
    public receive(bytes: Buffer): void {
        const pending = this.pending;
        if (!pending) {
            this.emit('unsolicited', Buffer.from(bytes));
            return;
        }

        let response: UdsResponse;
        try {
            response = decodeUdsResponse(bytes, pending.serviceId);
        } catch (err) {
            this.finish((entry) => entry.reject(err instanceof Error ? err : new Error(String(err))));
            return;
        }

        if (response.kind === 'negative' && response.responseCode === UdsNrc.ResponsePending) {
            pending.extensions += 1;
            if (pending.extensions > this.maxResponsePendingExtensions) {
                this.finish((entry) => entry.reject(new UdsError({
                    message: `${serviceName(pending.serviceId)} exceeded ${this.maxResponsePendingExtensions} response-pending extensions`,
                    domain: 'timeout',
                    code: 'RESPONSE_PENDING_EXCEEDED',
                    serviceId: pending.serviceId,
                    details: {extensions: pending.extensions},
                })));
                return;
            }
            clearTimeout(pending.timer);
            pending.timer = this.startTimer(this.responsePendingTimeoutMs);
            this.setState('response_pending_wait');
            this.emit('responsePending', pending.serviceId, pending.extensions);
            return;
        }

        this.applySideEffects(pending.request, response);
        this.finish((entry) => entry.resolve(response));
        // after settling, so a listener that drops the link cannot abort this exchange
        if (pending.request.serviceId === UdsService.EcuReset && response.kind === 'positive') {
            this.emit('ecuReset', (pending.request.subFunction ?? 0) & 0x7f);
        }
    }

    /** Rejects the outstanding exchange, if any (link down, send failure). */
    public abort(error: Error): void {
        this.finish((entry) => entry.reject(error));
    }

    /** Back to the default session with security locked, e.g. after a new connection. */
    public resetState(): void {
        this.setSession(DiagnosticSession.Default);
        this.setSecurity({status: 'locked'});
    }

    private startTimer(timeoutMs: number): NodeJS.Timeout {
        return setTimeout(() => {
            const serviceId = this.pending?.serviceId ?? 0;
            this.finish((entry) => entry.reject(new UdsError({
                message: `No response to ${serviceName(serviceId)} within ${timeoutMs}ms`,
                domain: 'timeout',
                code: 'TIMEOUT',
                serviceId,
                details: {timeoutMs, state: this.state},
            })));
        }, timeoutMs);
    }

    private finish(settle: (entry: PendingExchange) => void): void {
        const pending = this.pending;
        if (!pending) return;
        clearTimeout(pending.timer);
        this.pending = null;
        this.setState('idle');
        settle(pending);
    }

    private applySideEffects(request: UdsRequest, response: UdsResponse): void {
        const subFunction = (request.subFunction ?? 0) & 0x7f;
        switch (request.serviceId) {
            case UdsService.DiagnosticSessionControl:
                if (response.kind === 'positive' && subFunction !== this.session) {
                    this.setSession(subFunction);
                    this.setSecurity({status: 'locked'});
                }
                return;
            case UdsService.SecurityAccess: {
                if (subFunction % 2 === 1) {
                    if (response.kind !== 'positive') return;
                    const seed = response.data.subarray(1);
                    const alreadyUnlocked = seed.length > 0 && seed.every((byte) => byte === 0);
                    this.setSecurity(alreadyUnlocked
                        ? {status: 'unlocked', level: subFunction}
                        : {status: 'seedIssued', level: subFunction});
                    return;
                }
                this.setSecurity(response.kind === 'positive'
                    ? {status: 'unlocked', level: subFunction - 1}
                    : {status: 'locked'});
                return;
            }
            case UdsService.EcuReset:
                if (response.kind === 'positive') this.resetState();
                return;
            default:
        }
    }

    private setState(next: UdsSessionState): void {
        if (next === this.state) return;
        this.state = next;
        this.emit('stateChange', next);
    }

    private setSession(next: DiagnosticSession): void {
        if (next === this.session) return;
        this.session = next;
        this.emit('sessionChange', next);
    }

    private setSecurity(next: SecurityState): void {
        const current = this.security;
        const same = current.status === next.status
            && (current.status === 'locked' || next.status === 'locked' || current.level === next.level);
        if (same) return;
        this.security = next;
        this.emit('securityChange', {...next});
    }
}
