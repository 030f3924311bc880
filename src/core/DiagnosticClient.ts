/**
 * UDS diagnostic client bound to a DoIP connection.
 * @module core/DiagnosticClient
 */
import {DoipConnection, type DoipConnectionOptions} from '../protocols/doip';
import {UdsClient, type UdsClientOptions, type UdsRequest, type UdsResponse} from '../protocols/uds';

export const DEFAULT_TESTER_PRESENT_INTERVAL_MS = 2000;

/**
 * Configuration for {@link DiagnosticClient.connect}.
 */
export type DiagnosticClientOptions = DoipConnectionOptions & UdsClientOptions;

/**
 * High-level API: connect to an ECU over DoIP and run UDS services on it.
 *
 * After a successful `ecuReset()` the connection is invalidated; call
 * {@link reconnect} before the next request.
 */
export class DiagnosticClient extends UdsClient {
    private testerPresentTimer: NodeJS.Timeout | null = null;
    /** Keep-alive exchange in flight; settles without rejecting. */
    private keepAlive: Promise<void> | null = null;

    constructor(private readonly connection: DoipConnection, options: UdsClientOptions = {}) {
        super(connection, options);
    }

    /** Opens the DoIP connection, activates routing and returns a ready client. */
    public static async connect(options: DiagnosticClientOptions): Promise<DiagnosticClient> {
        const connection = await DoipConnection.open(options);
        return new DiagnosticClient(connection, options);
    }

    /**
     * Runs one exchange. A keep-alive TesterPresent in flight is let finish
     * first, so it never makes a caller's request fail with
     * `EXCHANGE_IN_PROGRESS`.
     */
    public async request(request: UdsRequest): Promise<UdsResponse> {
        const keepAlive = this.keepAlive;
        if (keepAlive) await keepAlive;
        return super.request(request);
    }

    public getConnection(): DoipConnection {
        return this.connection;
    }

    /**
     * Re-establishes TCP and routing activation. The ECU starts over in the
     * default session with security locked.
     */
    public async reconnect(): Promise<void> {
        await this.connection.reconnect();
        this.session.resetState();
    }

    /** Stops the keep-alive and releases the connection. */
    public close(): void {
        this.stopTesterPresent();
        this.connection.close();
    }

    /**
     * Sends TesterPresent every `intervalMs` to hold a non-default session.
     * Ticks are skipped while another exchange is in flight or routing is
     * not active. A failed keep-alive stops the timer and is emitted as `error`
     * when someone listens.
     */
    public startTesterPresent(intervalMs = DEFAULT_TESTER_PRESENT_INTERVAL_MS): void {
        if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
            throw new RangeError(`Tester present interval must be a positive number, got ${intervalMs}`);
        }
        this.stopTesterPresent();
        const timer = setInterval(() => {
            if (this.keepAlive || !this.session.isIdle() || this.connection.getState() !== 'active') return;
            const exchange = this.testerPresent()
                .catch((err: unknown) => this.keepAliveFailed(timer, err))
                .finally(() => {
                    if (this.keepAlive === exchange) this.keepAlive = null;
                });
            this.keepAlive = exchange;
        }, intervalMs);
        this.testerPresentTimer = timer;
    }

    public stopTesterPresent(): void {
        if (this.testerPresentTimer) {
            clearInterval(this.testerPresentTimer);
            this.testerPresentTimer = null;
        }
    }

    public isTesterPresentActive(): boolean {
        return this.testerPresentTimer !== null;
    }

    private keepAliveFailed(timer: NodeJS.Timeout, err: unknown): void {
        // stopped or restarted while the request was in flight
        if (this.testerPresentTimer !== timer) return;
        this.stopTesterPresent();
        if (this.listenerCount('error') > 0) {
            this.emit('error', err instanceof Error ? err : new Error(String(err)));
        }
    }
}

/**
 * Connects, runs `fn` and always closes the client, also when `fn` throws.
 */
export const withDiagnosticClient = async <T>(
    options: DiagnosticClientOptions,
    fn: (client: DiagnosticClient) => Promise<T> | T,
): Promise<T> => {
    const client = await DiagnosticClient.connect(options);
    try {
        return await fn(client);
    } finally {
        client.close();
    }
};
