/**
 * Data identifier value codecs for Read/WriteDataByIdentifier.
 * @module uds/data-identifiers
 */
import {DataIdentifier} from './constants';

export type DidValue = string | number | Buffer;

/**
 * Converts between a data identifier record and a typed value.
 * `encode` and `decode` throw `RangeError`/`TypeError` on values that do not fit.
 */
export interface DidCodec<T extends DidValue = DidValue> {
    readonly name: string;
    encode(value: DidValue): Buffer;
    decode(data: Buffer): T;
}

export type DidCodecTable = ReadonlyMap<number, DidCodec> | Readonly<Record<number, DidCodec>>;

const checkLength = (name: string, data: Buffer, length: number | undefined): void => {
    if (length !== undefined && data.length !== length) {
        throw new RangeError(`${name} expects ${length} bytes, got ${data.length}`);
    }
};

/** Fixed or variable length ASCII text (VIN, part numbers). */
export class AsciiCodec implements DidCodec<string> {
    public readonly name: string;

    constructor(private readonly length?: number) {
        this.name = length === undefined ? 'ascii' : `ascii(${length})`;
    }

    public encode(value: DidValue): Buffer {
        if (typeof value !== 'string') {
            throw new TypeError(`${this.name} expects a string value`);
        }
        if (!/^[\x20-\x7e]*$/.test(value)) {
            throw new RangeError(`${this.name} value must be printable ASCII`);
        }
        const data = Buffer.from(value, 'ascii');
        checkLength(this.name, data, this.length);
        return data;
    }

    /** Trailing NUL padding is dropped. */
    public decode(data: Buffer): string {
        checkLength(this.name, data, this.length);
        return data.toString('ascii').replace(/\0+$/, '');
    }
}

/** Bytes passed through unchanged. */
export class RawCodec implements DidCodec<Buffer> {
    public readonly name: string;

    constructor(private readonly length?: number) {
        this.name = length === undefined ? 'raw' : `raw(${length})`;
    }

    public encode(value: DidValue): Buffer {
        if (!Buffer.isBuffer(value)) {
            throw new TypeError(`${this.name} expects a Buffer value`);
        }
        checkLength(this.name, value, this.length);
        return Buffer.from(value);
    }

    public decode(data: Buffer): Buffer {
        checkLength(this.name, data, this.length);
        return Buffer.from(data);
    }
}

/** Unsigned big-endian integer of 1 to 6 bytes. */
export class UIntCodec implements DidCodec<number> {
    public readonly name: string;

    constructor(private readonly byteLength: number) {
        if (!Number.isInteger(byteLength) || byteLength < 1 || byteLength > 6) {
            throw new RangeError(`UIntCodec byte length must be 1-6, got ${byteLength}`);
        }
        this.name = `uint${byteLength * 8}`;
    }

    public encode(value: DidValue): Buffer {
        if (typeof value !== 'number') {
            throw new TypeError(`${this.name} expects a number value`);
        }
        const max = 2 ** (this.byteLength * 8) - 1;
        if (!Number.isInteger(value) || value < 0 || value > max) {
            throw new RangeError(`${this.name} value must be 0-${max}, got ${value}`);
        }
        const data = Buffer.alloc(this.byteLength);
        data.writeUIntBE(value, 0, this.byteLength);
        return data;
    }

    public decode(data: Buffer): number {
        checkLength(this.name, data, this.byteLength);
        return data.readUIntBE(0, this.byteLength);
    }
}

/** Codecs registered unless the caller overrides them. */
export const DEFAULT_DID_CODECS: ReadonlyMap<number, DidCodec> = new Map<number, DidCodec>([
    [DataIdentifier.Vin, new AsciiCodec(17)],
    [DataIdentifier.ActiveDiagnosticSession, new UIntCodec(1)],
]);

const isCodecMap = (table: DidCodecTable): table is ReadonlyMap<number, DidCodec> => table instanceof Map;

/** Merge codec tables; later tables win. */
export const mergeDidCodecs = (...tables: Array<DidCodecTable | undefined>): Map<number, DidCodec> => {
    const merged = new Map<number, DidCodec>();
    for (const table of tables) {
        if (!table) continue;
        const entries: Array<[number, DidCodec]> = isCodecMap(table)
            ? Array.from(table.entries())
            : Object.keys(table).map((key): [number, DidCodec] => [Number(key), table[Number(key)]]);
        for (const [id, codec] of entries) {
            if (!Number.isInteger(id) || id < 0 || id > 0xffff) {
                throw new RangeError(`Data identifier must be 0x0000-0xFFFF, got ${id}`);
            }
            merged.set(id, codec);
        }
    }
    return merged;
};
