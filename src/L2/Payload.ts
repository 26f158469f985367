/**
 * Extended Instruction Payloads
 *
 * Each payload shape has a fixed body size selected by a one-byte tag:
 *   0x00 NONE  0 bytes
 *   0x01 CALC  17 bytes  [OP:1][A:f64][B:f64]
 *   0x02 TIME  14 bytes  [REF:i64][DELTA:i32][UNIT:1][TZ:i8]
 */

import { INSTRUCTION_SIZE } from '../L1/Instruction.js';
import { MinLengthGuard, RangeGuard, enforce } from '../L0/Guards.js';
import { IsaError } from '../Errors.js';

// --- 1. Payload Type Tag ---

export enum PayloadType {
    NONE = 0x00,
    CALC = 0x01,
    TIME = 0x02,
}

export const PAYLOAD_TYPE_SIZE = 1;
export const CALC_PAYLOAD_SIZE = 17;
export const TIME_PAYLOAD_SIZE = 14;

const PAYLOAD_SIZES: Record<PayloadType, number> = {
    [PayloadType.NONE]: 0,
    [PayloadType.CALC]: CALC_PAYLOAD_SIZE,
    [PayloadType.TIME]: TIME_PAYLOAD_SIZE,
};

export function payloadTypeFromByte(byte: number): PayloadType | undefined {
    switch (byte) {
        case PayloadType.NONE: return PayloadType.NONE;
        case PayloadType.CALC: return PayloadType.CALC;
        case PayloadType.TIME: return PayloadType.TIME;
        default: return undefined;
    }
}

export function payloadSize(type: PayloadType): number {
    return PAYLOAD_SIZES[type];
}

/** Base instruction + tag byte + body. */
export function totalSize(type: PayloadType): number {
    return INSTRUCTION_SIZE + PAYLOAD_TYPE_SIZE + PAYLOAD_SIZES[type];
}

// --- 2. Arithmetic Arguments ---

export enum Op {
    ADD = 0x2B, // '+'
    SUB = 0x2D, // '-'
    MUL = 0x2A, // '*'
    DIV = 0x2F, // '/'
    MOD = 0x25, // '%'
    POW = 0x5E, // '^'
    SQRT = 0x53, // 'S'
}

const OP_SYMBOLS: Record<Op, string> = {
    [Op.ADD]: '+',
    [Op.SUB]: '-',
    [Op.MUL]: '*',
    [Op.DIV]: '/',
    [Op.MOD]: '%',
    [Op.POW]: '^',
    [Op.SQRT]: 'sqrt',
};

const UNARY_OPS: ReadonlySet<Op> = new Set([Op.SQRT]);

export function opFromByte(byte: number): Op | undefined {
    switch (byte) {
        case Op.ADD: return Op.ADD;
        case Op.SUB: return Op.SUB;
        case Op.MUL: return Op.MUL;
        case Op.DIV: return Op.DIV;
        case Op.MOD: return Op.MOD;
        case Op.POW: return Op.POW;
        case Op.SQRT: return Op.SQRT;
        default: return undefined;
    }
}

export function opSymbol(op: Op): string {
    return OP_SYMBOLS[op];
}

export function isUnary(op: Op): boolean {
    return UNARY_OPS.has(op);
}

export class CalcPayload {
    constructor(
        public readonly op: Op,
        public readonly a: number,
        public readonly b: number
    ) {
        Object.freeze(this);
    }

    /**
     * Unary operation; operand B is carried on the wire as 0.
     */
    static unary(op: Op, a: number): CalcPayload {
        return new CalcPayload(op, a, 0);
    }

    public toBytes(): Uint8Array {
        const bytes = new Uint8Array(CALC_PAYLOAD_SIZE);
        const view = new DataView(bytes.buffer);
        view.setUint8(0, this.op);
        view.setFloat64(1, this.a, false);
        view.setFloat64(9, this.b, false);
        return bytes;
    }

    static fromBytes(bytes: Uint8Array): CalcPayload {
        enforce(MinLengthGuard(CALC_PAYLOAD_SIZE), bytes);
        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        const op = opFromByte(view.getUint8(0));
        if (op === undefined) throw IsaError.payloadDecodeFailed('operator', view.getUint8(0));
        return new CalcPayload(op, view.getFloat64(1, false), view.getFloat64(9, false));
    }

    public equals(other: CalcPayload): boolean {
        return this.op === other.op && Object.is(this.a, other.a) && Object.is(this.b, other.b);
    }

    /** `a op b`, or `op(a)` for unary operators. */
    public toString(): string {
        if (isUnary(this.op)) return `${opSymbol(this.op)}(${formatOperand(this.a)})`;
        return `${formatOperand(this.a)} ${opSymbol(this.op)} ${formatOperand(this.b)}`;
    }
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest round-trip digits, always written out positionally:
 * `1e21` prints as `1000000000000000000000`, `-0` as `-0`, infinities as `inf`.
 */
export function formatOperand(value: number): string {
    if (Number.isNaN(value)) return 'NaN';
    if (value === Infinity) return 'inf';
    if (value === -Infinity) return '-inf';
    if (Object.is(value, -0)) return '-0';

    const text = String(value);
    const match = EXPONENT_FORM.exec(value.toExponential());
    if (!text.includes('e') || match === null) return text;

    const [, sign, lead, fraction = '', exponent] = match;
    const digits = lead + fraction;
    const point = 1 + Number(exponent);
    if (point >= digits.length) return sign + digits + '0'.repeat(point - digits.length);
    if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
    return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

// --- 3. Temporal Arguments ---

export enum TimeUnit {
    SECOND = 0,
    MINUTE = 1,
    HOUR = 2,
    DAY = 3,
    WEEK = 4,
    MONTH = 5,
    YEAR = 6,
}

const UNIT_SECONDS: Record<TimeUnit, bigint> = {
    [TimeUnit.SECOND]: 1n,
    [TimeUnit.MINUTE]: 60n,
    [TimeUnit.HOUR]: 3_600n,
    [TimeUnit.DAY]: 86_400n,
    [TimeUnit.WEEK]: 604_800n,
    [TimeUnit.MONTH]: 2_592_000n, // 30 days
    [TimeUnit.YEAR]: 31_536_000n, // 365 days
};

const UNIT_NAMES: Record<TimeUnit, string> = {
    [TimeUnit.SECOND]: 'second',
    [TimeUnit.MINUTE]: 'minute',
    [TimeUnit.HOUR]: 'hour',
    [TimeUnit.DAY]: 'day',
    [TimeUnit.WEEK]: 'week',
    [TimeUnit.MONTH]: 'month',
    [TimeUnit.YEAR]: 'year',
};

export function timeUnitFromByte(byte: number): TimeUnit | undefined {
    switch (byte) {
        case TimeUnit.SECOND: return TimeUnit.SECOND;
        case TimeUnit.MINUTE: return TimeUnit.MINUTE;
        case TimeUnit.HOUR: return TimeUnit.HOUR;
        case TimeUnit.DAY: return TimeUnit.DAY;
        case TimeUnit.WEEK: return TimeUnit.WEEK;
        case TimeUnit.MONTH: return TimeUnit.MONTH;
        case TimeUnit.YEAR: return TimeUnit.YEAR;
        default: return undefined;
    }
}

export function unitSeconds(unit: TimeUnit): bigint {
    return UNIT_SECONDS[unit];
}

export function unitName(unit: TimeUnit): string {
    return UNIT_NAMES[unit];
}

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;
const SECONDS_PER_HOUR = 3_600n;

export interface TimePayloadFields {
    reference: bigint | number;
    delta: number;
    unit: TimeUnit;
    tzOffset: number;
}

export class TimePayload {
    /** Unix epoch seconds. */
    public readonly reference: bigint;
    /** Positive = future, negative = past. */
    public readonly delta: number;
    public readonly unit: TimeUnit;
    /** Hours. */
    public readonly tzOffset: number;

    constructor(fields: TimePayloadFields) {
        this.reference = toI64(fields.reference);
        enforce(RangeGuard('delta', -0x8000_0000, 0x7FFF_FFFF), fields.delta);
        enforce(RangeGuard('tzOffset', -128, 127), fields.tzOffset);
        this.delta = fields.delta;
        this.unit = fields.unit;
        this.tzOffset = fields.tzOffset;
        Object.freeze(this);
    }

    static now(): TimePayload {
        return TimePayload.at(Math.floor(Date.now() / 1000));
    }

    static at(reference: bigint | number): TimePayload {
        return new TimePayload({ reference, delta: 0, unit: TimeUnit.SECOND, tzOffset: 0 });
    }

    static withDelta(reference: bigint | number, delta: number, unit: TimeUnit): TimePayload {
        return new TimePayload({ reference, delta, unit, tzOffset: 0 });
    }

    public withTz(tzOffset: number): TimePayload {
        return new TimePayload({ reference: this.reference, delta: this.delta, unit: this.unit, tzOffset });
    }

    /** reference + delta * unit + tzOffset hours */
    public targetTimestamp(): bigint {
        return this.reference
            + BigInt(this.delta) * UNIT_SECONDS[this.unit]
            + BigInt(this.tzOffset) * SECONDS_PER_HOUR;
    }

    public toBytes(): Uint8Array {
        const bytes = new Uint8Array(TIME_PAYLOAD_SIZE);
        const view = new DataView(bytes.buffer);
        view.setBigInt64(0, this.reference, false);
        view.setInt32(8, this.delta, false);
        view.setUint8(12, this.unit);
        view.setInt8(13, this.tzOffset);
        return bytes;
    }

    static fromBytes(bytes: Uint8Array): TimePayload {
        enforce(MinLengthGuard(TIME_PAYLOAD_SIZE), bytes);
        const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        const unit = timeUnitFromByte(view.getUint8(12));
        if (unit === undefined) throw IsaError.payloadDecodeFailed('time unit', view.getUint8(12));
        return new TimePayload({
            reference: view.getBigInt64(0, false),
            delta: view.getInt32(8, false),
            unit,
            tzOffset: view.getInt8(13),
        });
    }

    public equals(other: TimePayload): boolean {
        return this.reference === other.reference
            && this.delta === other.delta
            && this.unit === other.unit
            && this.tzOffset === other.tzOffset;
    }

    public toString(): string {
        return this.targetTimestamp().toString();
    }
}

function toI64(value: bigint | number): bigint {
    if (typeof value === 'number' && !Number.isInteger(value)) {
        throw IsaError.outOfRange('reference', value, I64_MIN, I64_MAX);
    }
    const big = BigInt(value);
    if (big < I64_MIN || big > I64_MAX) throw IsaError.outOfRange('reference', big, I64_MIN, I64_MAX);
    return big;
}

// --- 4. Tagged Union ---

export type Payload =
    | { type: PayloadType.NONE }
    | { type: PayloadType.CALC; calc: CalcPayload }
    | { type: PayloadType.TIME; time: TimePayload };

export const NO_PAYLOAD: Payload = { type: PayloadType.NONE };

/** Body bytes only; the tag byte is written by the envelope. */
export function encodePayload(payload: Payload): Uint8Array {
    switch (payload.type) {
        case PayloadType.NONE: return new Uint8Array(0);
        case PayloadType.CALC: return payload.calc.toBytes();
        case PayloadType.TIME: return payload.time.toBytes();
    }
}

export function decodePayload(type: PayloadType, body: Uint8Array): Payload {
    switch (type) {
        case PayloadType.NONE: return NO_PAYLOAD;
        case PayloadType.CALC: return { type, calc: CalcPayload.fromBytes(body) };
        case PayloadType.TIME: return { type, time: TimePayload.fromBytes(body) };
    }
}

export function payloadEquals(left: Payload, right: Payload): boolean {
    switch (left.type) {
        case PayloadType.NONE: return right.type === PayloadType.NONE;
        case PayloadType.CALC: return right.type === PayloadType.CALC && left.calc.equals(right.calc);
        case PayloadType.TIME: return right.type === PayloadType.TIME && left.time.equals(right.time);
    }
}
