import { InvalidArgumentError } from 'commander';

export interface GreetingOptions {
    name: string;
    count: number;
    uppercase: boolean;
}

export const DEFAULT_NAME = 'World';

/**
 * Parse `--count`. Zero is accepted and prints nothing.
 */
export function parseCount(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    const count = Number(value);
    if (count > 0xFFFFFFFF) {
        throw new InvalidArgumentError('Count is too large.');
    }
    return count;
}

export function greetingMessage(name: string, uppercase: boolean): string {
    return uppercase ? `HELLO, ${name.toUpperCase()}!` : `Hello, ${name}!`;
}

/**
 * One line per repetition; lines are numbered only when there is more than one.
 */
export function buildGreeting(options: GreetingOptions): string[] {
    const message = greetingMessage(options.name, options.uppercase);
    if (options.count === 1) return [message];

    const lines: string[] = [];
    for (let i = 1; i <= options.count; i++) {
        lines.push(`${message} (${i})`);
    }
    return lines;
}
