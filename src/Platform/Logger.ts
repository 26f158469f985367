// src/Platform/Logger.ts

export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Console logger with a bracketed component prefix.
 * `quiet` drops info lines; warnings and errors always print.
 */
export class ConsoleLogger implements Logger {
    constructor(
        private readonly component: string = 'frame-isa',
        private readonly quiet: boolean = false
    ) { }

    info(message: string): void {
        if (!this.quiet) console.log(`[${this.component}] ${message}`);
    }

    warn(message: string): void {
        console.warn(`[${this.component}] ${message}`);
    }

    error(message: string): void {
        console.error(`[${this.component}] ${message}`);
    }
}
