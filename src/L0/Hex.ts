// src/L0/Hex.ts

export function hex8(value: number): string {
    return value.toString(16).toUpperCase().padStart(2, '0');
}

export function hex16(value: number): string {
    return value.toString(16).toUpperCase().padStart(4, '0');
}
