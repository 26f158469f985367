// src/L1/Instruction.ts
import { Action } from '../L0/Action.js';
import { Subject } from '../L0/Subject.js';
import { Modifier } from '../L0/Modifier.js';
import { hex16 } from '../L0/Hex.js';
import { ExactLengthGuard, MultipleLengthGuard, enforce } from '../L0/Guards.js';
import { IsaError, attempt } from '../Errors.js';
import type { DecodeResult } from '../Errors.js';

/** Size of a single instruction in bytes. */
export const INSTRUCTION_SIZE = 6;

const OPCODE_GROUP = /^[0-9a-fA-F]+$/;

export interface InstructionJSON {
    action: number;
    subject: number;
    modifier: number;
}

/**
 * A 6-byte instruction: [ACT_HI ACT_LO][SUBJ_HI SUBJ_LO][MOD_HI MOD_LO], big-endian.
 */
export class Instruction {
    constructor(
        public readonly action: Action,
        public readonly subject: Subject,
        public readonly modifier: Modifier
    ) {
        Object.freeze(this);
    }

    static simple(action: Action, subject: Subject): Instruction {
        return new Instruction(action, subject, Modifier.default());
    }

    // --- 1. Binary Codec ---

    static parseOne(bytes: Uint8Array): Instruction {
        enforce(ExactLengthGuard(INSTRUCTION_SIZE), bytes);
        return new Instruction(
            Action.fromU16(readU16(bytes, 0)),
            Subject.fromU16(readU16(bytes, 2)),
            Modifier.fromU16(readU16(bytes, 4))
        );
    }

    static parseAll(bytes: Uint8Array): Instruction[] {
        enforce(MultipleLengthGuard(INSTRUCTION_SIZE), bytes);
        const instructions: Instruction[] = [];
        for (let offset = 0; offset < bytes.length; offset += INSTRUCTION_SIZE) {
            instructions.push(Instruction.parseOne(bytes.subarray(offset, offset + INSTRUCTION_SIZE)));
        }
        return instructions;
    }

    static tryParseOne(bytes: Uint8Array): DecodeResult<Instruction> {
        return attempt(() => Instruction.parseOne(bytes));
    }

    static tryParseAll(bytes: Uint8Array): DecodeResult<Instruction[]> {
        return attempt(() => Instruction.parseAll(bytes));
    }

    public toBytes(): Uint8Array {
        const bytes = new Uint8Array(INSTRUCTION_SIZE);
        writeU16(bytes, 0, this.action.asU16());
        writeU16(bytes, 2, this.subject.asU16());
        writeU16(bytes, 4, this.modifier.asU16());
        return bytes;
    }

    static toBytesAll(instructions: readonly Instruction[]): Uint8Array {
        const bytes = new Uint8Array(instructions.length * INSTRUCTION_SIZE);
        instructions.forEach((instr, i) => bytes.set(instr.toBytes(), i * INSTRUCTION_SIZE));
        return bytes;
    }

    // --- 2. Opcode Text Codec ("AAAA:SSSS:MMMM") ---

    public toOpcodeString(): string {
        return [this.action.asU16(), this.subject.asU16(), this.modifier.asU16()].map(hex16).join(':');
    }

    static fromOpcodeString(text: string): Instruction {
        const parts = text.split(':');
        if (parts.length !== 3 || !parts.every(p => OPCODE_GROUP.test(p))) {
            throw IsaError.invalidOpcodeString(text);
        }
        const [action, subject, modifier] = parts.map(p => parseInt(p, 16));
        if ([action, subject, modifier].some(v => v > 0xFFFF)) {
            throw IsaError.invalidOpcodeString(text);
        }
        return new Instruction(Action.fromU16(action), Subject.fromU16(subject), Modifier.fromU16(modifier));
    }

    static tryFromOpcodeString(text: string): DecodeResult<Instruction> {
        return attempt(() => Instruction.fromOpcodeString(text));
    }

    // --- 3. Derived Predicates ---

    public needsRag(): boolean {
        return this.subject.isRagReference();
    }

    public isChain(): boolean {
        return this.action.isChain() || this.subject.isTrmReference();
    }

    public isSystem(): boolean {
        return this.action.isSystem();
    }

    public equals(other: Instruction): boolean {
        return this.action.equals(other.action)
            && this.subject.equals(other.subject)
            && this.modifier.equals(other.modifier);
    }

    public toString(): string {
        return `[${this.action.toString()} | ${this.subject.toString()} | ${this.modifier.toString()}]`;
    }

    public toJSON(): InstructionJSON {
        return {
            action: this.action.asU16(),
            subject: this.subject.asU16(),
            modifier: this.modifier.asU16(),
        };
    }

    static fromJSON(json: InstructionJSON): Instruction {
        return new Instruction(
            Action.fromU16(json.action),
            Subject.fromU16(json.subject),
            Modifier.fromU16(json.modifier)
        );
    }
}

// --- Big-endian helpers ---

function readU16(bytes: Uint8Array, offset: number): number {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint16(offset, false);
}

function writeU16(bytes: Uint8Array, offset: number, value: number): void {
    new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint16(offset, value, false);
}
