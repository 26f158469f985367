/**
 * Modifier Bitfield (2 bytes)
 *
 *   Bit:  15 14 | 13 12 | 11 10 |  9  8  |  7  6   |  5  4   | 3..0
 *         VOICE | TONE  | WARM  | FORMAT | ACCURACY| URGENCY | reserved
 *
 * Six independent 2-bit style attributes. The reserved nibble is carried
 * through every setter untouched.
 */

import { hex16 } from './Hex.js';

// --- 1. Field Levels (enum value = 2-bit pattern) ---

export enum Voice { NEUTRAL = 0, FORMAL = 1, CASUAL = 2, TECHNICAL = 3 }
export enum Tone { NEUTRAL = 0, POSITIVE = 1, EMPATHETIC = 2, CAUTIOUS = 3 }
export enum Warmth { COLD = 0, NEUTRAL = 1, WARM = 2, VERY_WARM = 3 }
export enum Format { PROSE = 0, BULLETED = 1, NUMBERED = 2, STRUCTURED = 3 }
export enum Accuracy { LOW = 0, MEDIUM = 1, HIGH = 2, VERIFIED = 3 }
export enum Urgency { LOW = 0, NORMAL = 1, HIGH = 2, CRITICAL = 3 }

type Quad<T> = readonly [T, T, T, T];

interface BitField<L extends number> {
    mask: number;
    shift: number;
    levels: Quad<L>;
    labels: Quad<string>;
}

// --- 2. Field Layout ---

const VOICE: BitField<Voice> = {
    mask: 0xC000, shift: 14,
    levels: [Voice.NEUTRAL, Voice.FORMAL, Voice.CASUAL, Voice.TECHNICAL],
    labels: ['Neutral', 'Formal', 'Casual', 'Technical'],
};
const TONE: BitField<Tone> = {
    mask: 0x3000, shift: 12,
    levels: [Tone.NEUTRAL, Tone.POSITIVE, Tone.EMPATHETIC, Tone.CAUTIOUS],
    labels: ['Neutral', 'Positive', 'Empathetic', 'Cautious'],
};
const WARMTH: BitField<Warmth> = {
    mask: 0x0C00, shift: 10,
    levels: [Warmth.COLD, Warmth.NEUTRAL, Warmth.WARM, Warmth.VERY_WARM],
    labels: ['Cold', 'Neutral', 'Warm', 'VeryWarm'],
};
const FORMAT: BitField<Format> = {
    mask: 0x0300, shift: 8,
    levels: [Format.PROSE, Format.BULLETED, Format.NUMBERED, Format.STRUCTURED],
    labels: ['Prose', 'Bulleted', 'Numbered', 'Structured'],
};
const ACCURACY: BitField<Accuracy> = {
    mask: 0x00C0, shift: 6,
    levels: [Accuracy.LOW, Accuracy.MEDIUM, Accuracy.HIGH, Accuracy.VERIFIED],
    labels: ['Low', 'Medium', 'High', 'Verified'],
};
const URGENCY: BitField<Urgency> = {
    mask: 0x0030, shift: 4,
    levels: [Urgency.LOW, Urgency.NORMAL, Urgency.HIGH, Urgency.CRITICAL],
    labels: ['Low', 'Normal', 'High', 'Critical'],
};

export const RESERVED_MASK = 0x000F;

// Masked and shifted, a 2-bit field indexes its 4-entry tables directly.
function slot(value: number, field: BitField<number>): number {
    return (value & field.mask) >>> field.shift;
}

function read<L extends number>(value: number, field: BitField<L>): L {
    return field.levels[slot(value, field)];
}

function write<L extends number>(value: number, field: BitField<L>, level: L): number {
    return (value & ~field.mask & 0xFFFF) | ((level << field.shift) & field.mask);
}

export class Modifier {
    // --- 3. Single-field Patterns ---
    static readonly VOICE_NEUTRAL = new Modifier(0x0000);
    static readonly VOICE_FORMAL = new Modifier(0x4000);
    static readonly VOICE_CASUAL = new Modifier(0x8000);
    static readonly VOICE_TECHNICAL = new Modifier(0xC000);

    static readonly TONE_NEUTRAL = new Modifier(0x0000);
    static readonly TONE_POSITIVE = new Modifier(0x1000);
    static readonly TONE_EMPATHETIC = new Modifier(0x2000);
    static readonly TONE_CAUTIOUS = new Modifier(0x3000);

    static readonly WARMTH_COLD = new Modifier(0x0000);
    static readonly WARMTH_NEUTRAL = new Modifier(0x0400);
    static readonly WARMTH_WARM = new Modifier(0x0800);
    static readonly WARMTH_VERY_WARM = new Modifier(0x0C00);

    static readonly FORMAT_PROSE = new Modifier(0x0000);
    static readonly FORMAT_BULLETED = new Modifier(0x0100);
    static readonly FORMAT_NUMBERED = new Modifier(0x0200);
    static readonly FORMAT_STRUCTURED = new Modifier(0x0300);

    static readonly ACCURACY_LOW = new Modifier(0x0000);
    static readonly ACCURACY_MEDIUM = new Modifier(0x0040);
    static readonly ACCURACY_HIGH = new Modifier(0x0080);
    static readonly ACCURACY_VERIFIED = new Modifier(0x00C0);

    static readonly URGENCY_LOW = new Modifier(0x0000);
    static readonly URGENCY_NORMAL = new Modifier(0x0010);
    static readonly URGENCY_HIGH = new Modifier(0x0020);
    static readonly URGENCY_CRITICAL = new Modifier(0x0030);

    private constructor(private readonly value: number) {
        Object.freeze(this);
    }

    static fromU16(value: number): Modifier {
        return new Modifier(value & 0xFFFF);
    }

    /**
     * Default persona: Warmth NEUTRAL | Accuracy MEDIUM | Urgency NORMAL (0x0450).
     */
    static default(): Modifier {
        return new Modifier(0x0400 | 0x0040 | 0x0010);
    }

    // --- 4. Presets ---

    static crisis(): Modifier {
        return Modifier.fromU16(0x0000)
            .withTone(Tone.EMPATHETIC)
            .withWarmth(Warmth.VERY_WARM)
            .withUrgency(Urgency.HIGH)
            .withAccuracy(Accuracy.HIGH);
    }

    static professional(): Modifier {
        return Modifier.fromU16(0x0000)
            .withVoice(Voice.FORMAL)
            .withWarmth(Warmth.NEUTRAL)
            .withAccuracy(Accuracy.HIGH)
            .withUrgency(Urgency.NORMAL);
    }

    static friendly(): Modifier {
        return Modifier.fromU16(0x0000)
            .withVoice(Voice.CASUAL)
            .withTone(Tone.POSITIVE)
            .withWarmth(Warmth.WARM)
            .withUrgency(Urgency.NORMAL);
    }

    public asU16(): number {
        return this.value;
    }

    // --- 5. Accessors ---

    public voice(): Voice { return read(this.value, VOICE); }
    public tone(): Tone { return read(this.value, TONE); }
    public warmth(): Warmth { return read(this.value, WARMTH); }
    public format(): Format { return read(this.value, FORMAT); }
    public accuracy(): Accuracy { return read(this.value, ACCURACY); }
    public urgency(): Urgency { return read(this.value, URGENCY); }

    public reserved(): number {
        return this.value & RESERVED_MASK;
    }

    // --- 6. Functional Setters ---

    public withVoice(voice: Voice): Modifier { return new Modifier(write(this.value, VOICE, voice)); }
    public withTone(tone: Tone): Modifier { return new Modifier(write(this.value, TONE, tone)); }
    public withWarmth(warmth: Warmth): Modifier { return new Modifier(write(this.value, WARMTH, warmth)); }
    public withFormat(format: Format): Modifier { return new Modifier(write(this.value, FORMAT, format)); }
    public withAccuracy(accuracy: Accuracy): Modifier { return new Modifier(write(this.value, ACCURACY, accuracy)); }
    public withUrgency(urgency: Urgency): Modifier { return new Modifier(write(this.value, URGENCY, urgency)); }

    public equals(other: Modifier): boolean {
        return this.value === other.value;
    }

    /**
     * Labels for each field, MSB first.
     */
    public describe(): { voice: string; tone: string; warmth: string; format: string; accuracy: string; urgency: string } {
        return {
            voice: VOICE.labels[slot(this.value, VOICE)],
            tone: TONE.labels[slot(this.value, TONE)],
            warmth: WARMTH.labels[slot(this.value, WARMTH)],
            format: FORMAT.labels[slot(this.value, FORMAT)],
            accuracy: ACCURACY.labels[slot(this.value, ACCURACY)],
            urgency: URGENCY.labels[slot(this.value, URGENCY)],
        };
    }

    public toString(): string {
        const d = this.describe();
        return `MOD(0x${hex16(this.value)}: ${d.voice}/${d.tone}/${d.warmth}/${d.format})`;
    }

    public toJSON(): number {
        return this.value;
    }
}
