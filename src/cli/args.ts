import { ConfigError } from "../errors";

export function requireValue(argv: string[], i: number, flag: string): string {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("-")) {
        throw new ConfigError(`Option ${flag} expects a value.`);
    }
    return value;
}

export function parseInteger(value: string, flag: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new ConfigError(`Option ${flag} must be an integer, got: ${value}`);
    }
    return parsed;
}
