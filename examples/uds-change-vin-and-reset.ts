import {
    DataIdentifier,
    DiagnosticSession,
    EcuResetType,
    formatDiagnosticError,
    withDiagnosticClient,
} from '../src';

type CliOptions = {
    host: string;
    vin?: string;
    ecuAddress?: number;
    testerAddress?: number;
    tls: boolean;
};

function parseAddress(value: string): number | undefined {
    const n = Number(value);
    return Number.isInteger(n) && n >= 0 && n <= 0xffff ? n : undefined;
}

function parseArgs(argv: string[]): CliOptions {
    const out: CliOptions = {host: '127.0.0.1', tls: false};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            out.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--vin=')) {
            out.vin = arg.substring('--vin='.length);
        } else if (arg.startsWith('--ecu=')) {
            out.ecuAddress = parseAddress(arg.substring('--ecu='.length));
        } else if (arg.startsWith('--tester=')) {
            out.testerAddress = parseAddress(arg.substring('--tester='.length));
        } else if (arg === '--tls') {
            out.tls = true;
        }
    }
    return out;
}

async function main(): Promise<void> {
    const opts = parseArgs(process.argv.slice(2));
    await withDiagnosticClient({
        host: opts.host,
        transport: opts.tls ? 'tls' : 'tcp',
        ecuAddress: opts.ecuAddress,
        testerAddress: opts.testerAddress,
    }, async (client) => {
        console.log(`VIN: ${String(await client.readDataByIdentifier(DataIdentifier.Vin))}`);

        if (opts.vin) {
            const timings = await client.changeSession(DiagnosticSession.Extended);
            console.log(`Extended session (P2 ${timings.p2Ms}ms, P2* ${timings.p2StarMs}ms)`);
            await client.writeDataByIdentifier(DataIdentifier.Vin, opts.vin);
            console.log(`VIN written: ${opts.vin}`);
        }

        await client.ecuReset(EcuResetType.HardReset);
        console.log('ECU reset accepted, reconnecting');
        await client.reconnect();
        console.log(`VIN after reset: ${String(await client.readDataByIdentifier(DataIdentifier.Vin))}`);
    });
}

main().catch((err: unknown) => {
    console.error(formatDiagnosticError(err));
    process.exitCode = 1;
});
