// src/L1/InstructionBuilder.ts
import type { Action } from '../L0/Action.js';
import { Subject } from '../L0/Subject.js';
import { Modifier } from '../L0/Modifier.js';
import type { Voice, Tone, Warmth, Format, Urgency } from '../L0/Modifier.js';
import { Instruction } from './Instruction.js';

/**
 * Fluent construction of an Instruction.
 * Subject defaults to NULL and the modifier to the default persona.
 */
export class InstructionBuilder {
    private _subject: Subject = Subject.NULL;
    private _modifier: Modifier = Modifier.default();

    constructor(private readonly _action: Action) { }

    subject(subject: Subject): this {
        this._subject = subject;
        return this;
    }

    modifier(modifier: Modifier): this {
        this._modifier = modifier;
        return this;
    }

    // --- Style ---

    voice(voice: Voice): this {
        this._modifier = this._modifier.withVoice(voice);
        return this;
    }

    tone(tone: Tone): this {
        this._modifier = this._modifier.withTone(tone);
        return this;
    }

    warmth(warmth: Warmth): this {
        this._modifier = this._modifier.withWarmth(warmth);
        return this;
    }

    format(format: Format): this {
        this._modifier = this._modifier.withFormat(format);
        return this;
    }

    urgency(urgency: Urgency): this {
        this._modifier = this._modifier.withUrgency(urgency);
        return this;
    }

    build(): Instruction {
        return new Instruction(this._action, this._subject, this._modifier);
    }
}

export function instruction(action: Action): InstructionBuilder {
    return new InstructionBuilder(action);
}
