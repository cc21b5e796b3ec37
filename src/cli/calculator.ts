/**
 * Calculator - arithmetic with checked results and a small expression evaluator
 */

export type CalcErrorKind = 'DivisionByZero' | 'InvalidExpression' | 'ParseError' | 'UnknownOperation';

export class CalcError extends Error {
    readonly kind: CalcErrorKind;

    constructor(kind: CalcErrorKind, detail: string = '') {
        super(CalcError.describe(kind, detail));
        this.name = 'CalcError';
        this.kind = kind;
    }

    private static describe(kind: CalcErrorKind, detail: string): string {
        switch (kind) {
            case 'DivisionByZero':
                return 'Division by zero';
            case 'InvalidExpression':
                return `Invalid expression: ${detail}`;
            case 'ParseError':
                return `Number parsing error: ${detail}`;
            case 'UnknownOperation':
                return `Unknown operation: ${detail}`;
        }
    }
}

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumber(text: string): number {
    const trimmed = text.trim();
    if (!NUMBER_PATTERN.test(trimmed)) {
        throw new CalcError('ParseError', `"${text}" is not a number`);
    }
    return Number(trimmed);
}

function checked(result: number, detail: string = 'Result overflow'): number {
    if (!Number.isFinite(result)) {
        throw new CalcError('InvalidExpression', detail);
    }
    return result;
}

export function add(a: number, b: number): number {
    return checked(a + b);
}

export function subtract(a: number, b: number): number {
    return checked(a - b);
}

export function multiply(a: number, b: number): number {
    return checked(a * b);
}

export function divide(a: number, b: number): number {
    if (b === 0) {
        throw new CalcError('DivisionByZero');
    }
    return checked(a / b);
}

export function power(base: number, exp: number): number {
    if (base < 0 && !Number.isInteger(exp)) {
        throw new CalcError('InvalidExpression', 'Cannot calculate non-integer power of negative number');
    }
    return checked(Math.pow(base, exp), 'Result overflow or invalid');
}

export function squareRoot(value: number): number {
    if (value < 0) {
        throw new CalcError('InvalidExpression', 'Cannot calculate square root of negative number');
    }
    return Math.sqrt(value);
}

export type BinaryOperator = '+' | '-' | '*' | '/';

const OPERATORS: Record<BinaryOperator, (a: number, b: number) => number> = {
    '+': add,
    '-': subtract,
    '*': multiply,
    '/': divide
};

function isBinaryOperator(symbol: string): symbol is BinaryOperator {
    return Object.hasOwn(OPERATORS, symbol);
}

export function applyOperator(symbol: string, a: number, b: number): number {
    if (!isBinaryOperator(symbol)) {
        throw new CalcError('UnknownOperation', symbol);
    }
    return OPERATORS[symbol](a, b);
}

// Lowest precedence first; each is split at its rightmost occurrence
const SPLIT_ORDER: readonly BinaryOperator[] = ['+', '-', '*', '/'];

/**
 * Evaluate `+ - * /` with the usual precedence. Whitespace is ignored and a
 * leading `-` negates the rest of the expression.
 */
export function evaluateExpression(expression: string): number {
    const expr = expression.replace(/\s+/g, '');

    for (const symbol of SPLIT_ORDER) {
        const pos = expr.lastIndexOf(symbol);
        if (pos === -1) continue;

        if (symbol === '-' && pos === 0) {
            return -evaluateExpression(expr.slice(1));
        }
        const left = evaluateExpression(expr.slice(0, pos));
        const right = evaluateExpression(expr.slice(pos + 1));
        return applyOperator(symbol, left, right);
    }

    if (!NUMBER_PATTERN.test(expr)) {
        throw new CalcError('InvalidExpression', expr);
    }
    return Number(expr);
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Print a result as a plain decimal, never in exponent notation
 */
export function formatNumber(value: number): string {
    const text = String(value);
    const match = EXPONENT_FORM.exec(text);
    if (!match) {
        return text;
    }

    const [, sign, lead, fraction = '', exp] = match;
    const digits = lead + fraction;
    const exponent = Number(exp);
    if (exponent > 0) {
        return sign + digits.padEnd(exponent + 1, '0');
    }
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
}

export const INTERACTIVE_BANNER: readonly string[] = [
    'Calculator Interactive Mode',
    "Enter mathematical expressions or 'quit' to exit",
    'Examples: 2 + 3, 10 / 2, sqrt 16'
];

export const INTERACTIVE_HELP: readonly string[] = [
    'Available operations:',
    '  Basic: +, -, *, /',
    '  Special: sqrt <number>',
    '  Commands: help, quit, exit',
    'Examples:',
    '  2 + 3',
    '  10 / 2',
    '  sqrt 16',
    '  -5 + 3'
];

export interface InteractiveResult {
    output: string[];
    done: boolean;
}

function errorLine(error: unknown): string {
    return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Handle one line of interactive input. Errors are reported as output, never thrown.
 */
export function handleInteractiveLine(line: string): InteractiveResult {
    const input = line.trim();

    if (input === '') {
        return { output: [], done: false };
    }
    if (input === 'quit' || input === 'exit') {
        return { output: ['Goodbye!'], done: true };
    }
    if (input === 'help') {
        return { output: [...INTERACTIVE_HELP], done: false };
    }

    if (input.startsWith('sqrt ')) {
        let value: number;
        try {
            value = parseNumber(input.slice('sqrt '.length));
        } catch {
            return { output: ['Error: Invalid number format'], done: false };
        }
        try {
            return { output: [`√${formatNumber(value)} = ${formatNumber(squareRoot(value))}`], done: false };
        } catch (error) {
            return { output: [errorLine(error)], done: false };
        }
    }

    try {
        return { output: [`${input} = ${formatNumber(evaluateExpression(input))}`], done: false };
    } catch (error) {
        return { output: [errorLine(error)], done: false };
    }
}
