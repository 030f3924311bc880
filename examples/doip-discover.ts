import {DoipDiscovery, formatDiagnosticError} from '../src';

type CliOptions = {
    target?: string;
    timeoutMs?: number;
    bindAddress?: string;
    listen: boolean;
};

function parseArgs(argv: string[]): CliOptions {
    const out: CliOptions = {listen: false};
    for (const arg of argv) {
        if (arg.startsWith('--target=')) {
            out.target = arg.substring('--target='.length);
        } else if (arg.startsWith('--timeout=')) {
            const n = Number(arg.substring('--timeout='.length));
            if (Number.isFinite(n) && n > 0) out.timeoutMs = Math.round(n);
        } else if (arg.startsWith('--bind=')) {
            out.bindAddress = arg.substring('--bind='.length);
        } else if (arg === '--listen') {
            out.listen = true;
        }
    }
    return out;
}

const hex16 = (value: number): string => `0x${value.toString(16).padStart(4, '0')}`;

async function main(): Promise<void> {
    const opts = parseArgs(process.argv.slice(2));
    // --listen binds 13400 so vehicle announcements after power-up are heard as well
    const discovery = new DoipDiscovery({
        bindAddress: opts.bindAddress,
        bindPort: opts.listen ? 13400 : undefined,
        timeoutMs: opts.timeoutMs,
    });
    try {
        const vehicles = await discovery.collect(opts.target);
        console.log(`Found ${vehicles.length} DoIP entit${vehicles.length === 1 ? 'y' : 'ies'}`);
        for (const vehicle of vehicles) {
            const {vin, eid, furtherAction} = vehicle.announcement;
            console.log(`- ${vehicle.ip}:${vehicle.port} vin=${vin} address=${hex16(vehicle.logicalAddress)} eid=${eid.toString('hex')} furtherAction=${furtherAction}`);
        }
    } finally {
        discovery.close();
    }
}

main().catch((err: unknown) => {
    console.error(formatDiagnosticError(err));
    process.exitCode = 1;
});
