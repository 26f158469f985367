// src/Platform/Console/Inspector.ts
import { Instruction } from '../../L1/Instruction.js';
import { ExtendedInstruction } from '../../L2/ExtendedInstruction.js';
import { IsaError } from '../../Errors.js';
import { hex8, hex16 } from '../../L0/Hex.js';
import type { Logger } from '../Logger.js';

export const EXIT_OK = 0;
export const EXIT_DECODE_ERROR = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
    'usage: frame-isa <command> <input>',
    '  decode <hex> [--extended]   bytes -> instructions',
    '  encode <AAAA:SSSS:MMMM>     opcode text -> hex bytes',
    '  describe <AAAA:SSSS:MMMM>   field-by-field breakdown',
].join('\n');

const HEX_BYTES = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Command surface of the `frame-isa` CLI. Results go to `out`, diagnostics
 * to the logger; `run` returns the process exit code.
 */
export class OpcodeInspector {
    constructor(
        private readonly logger: Logger,
        private readonly out: (line: string) => void
    ) { }

    public run(argv: readonly string[]): number {
        const extended = argv.includes('--extended');
        const [command, input] = argv.filter(a => a !== '--extended');

        if (!command || input === undefined) {
            this.logger.error(USAGE);
            return EXIT_USAGE;
        }

        try {
            switch (command) {
                case 'decode':
                    this.decode(input, extended);
                    break;
                case 'encode':
                    this.encode(input);
                    break;
                case 'describe':
                    this.describe(input);
                    break;
                default:
                    this.logger.error(`Unknown command: ${command}\n${USAGE}`);
                    return EXIT_USAGE;
            }
        } catch (e) {
            if (e instanceof IsaError) {
                this.logger.error(e.message);
                return EXIT_DECODE_ERROR;
            }
            throw e;
        }
        return EXIT_OK;
    }

    private decode(input: string, extended: boolean): void {
        const bytes = parseHex(input);
        if (extended) {
            const ext = ExtendedInstruction.fromBytes(bytes);
            this.logger.info(`Decoded extended instruction (${ext.byteSize()} bytes)`);
            this.out(ext.toString());
            return;
        }
        const instructions = Instruction.parseAll(bytes);
        this.logger.info(`Decoded ${instructions.length} instruction(s)`);
        instructions.forEach(instr => this.out(instr.toString()));
    }

    private encode(input: string): void {
        const instr = Instruction.fromOpcodeString(input);
        this.out(Buffer.from(instr.toBytes()).toString('hex'));
    }

    private describe(input: string): void {
        const instr = Instruction.fromOpcodeString(input);
        const { action, subject, modifier } = instr;
        const m = modifier.describe();

        let subjectRef = '';
        const docId = subject.ragDocId();
        const modelId = subject.trmModelId();
        if (docId !== undefined) subjectRef = ` doc=${docId}`;
        if (modelId !== undefined) subjectRef = ` model=${modelId}`;

        this.out(`opcode   ${instr.toOpcodeString()}`);
        this.out(`action   0x${hex16(action.asU16())} ${action.name()} category=0x${hex8(action.category())}`);
        this.out(`subject  0x${hex16(subject.asU16())} ${subject.name()}${subjectRef}`);
        this.out(
            `modifier 0x${hex16(modifier.asU16())} voice=${m.voice} tone=${m.tone} warmth=${m.warmth} ` +
            `format=${m.format} accuracy=${m.accuracy} urgency=${m.urgency} reserved=${modifier.reserved()}`
        );
    }
}

/**
 * Hex text to bytes. Whitespace and colons between digits are ignored.
 */
export function parseHex(input: string): Uint8Array {
    const digits = input.replace(/[\s:]/g, '');
    if (!HEX_BYTES.test(digits)) throw IsaError.invalidOpcodeString(input);
    return new Uint8Array(Buffer.from(digits, 'hex'));
}
