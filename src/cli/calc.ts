#!/usr/bin/env node

/**
 * calc - arithmetic subcommands, an expression evaluator and an interactive prompt
 */

import { createInterface } from 'node:readline';
import { Command, InvalidArgumentError } from 'commander';
import {
    INTERACTIVE_BANNER,
    add,
    divide,
    evaluateExpression,
    formatNumber,
    handleInteractiveLine,
    multiply,
    parseNumber,
    power,
    squareRoot,
    subtract
} from './calculator';

function numberArgument(value: string): number {
    try {
        return parseNumber(value);
    } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
}

function report(compute: () => string): void {
    try {
        console.log(compute());
    } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}

function runInteractive(): void {
    for (const line of INTERACTIVE_BANNER) console.log(line);

    const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'calc> ' });
    rl.on('line', (line) => {
        const result = handleInteractiveLine(line);
        for (const out of result.output) console.log(out);
        if (result.done) {
            rl.close();
        } else {
            rl.prompt();
        }
    });
    rl.prompt();
}

const program = new Command();

program
    .name('calc')
    .description('A simple calculator CLI tool')
    .version('0.1.0')
    .action(() => {
        console.log('No command provided. Use --help for usage information.');
        console.log('Quick examples:');
        console.log('  calc add 10 5');
        console.log('  calc eval "2 + 3 * 4"');
        console.log('  calc interactive');
    });

program
    .command('add')
    .alias('a')
    .description('Add two numbers')
    .argument('<a>', 'First number', numberArgument)
    .argument('<b>', 'Second number', numberArgument)
    .action((a: number, b: number) => report(() => `${formatNumber(a)} + ${formatNumber(b)} = ${formatNumber(add(a, b))}`));

program
    .command('subtract')
    .alias('s')
    .description('Subtract two numbers')
    .argument('<a>', 'First number', numberArgument)
    .argument('<b>', 'Second number to subtract', numberArgument)
    .action((a: number, b: number) => report(() => `${formatNumber(a)} - ${formatNumber(b)} = ${formatNumber(subtract(a, b))}`));

program
    .command('multiply')
    .alias('m')
    .description('Multiply two numbers')
    .argument('<a>', 'First number', numberArgument)
    .argument('<b>', 'Second number', numberArgument)
    .action((a: number, b: number) => report(() => `${formatNumber(a)} * ${formatNumber(b)} = ${formatNumber(multiply(a, b))}`));

program
    .command('divide')
    .alias('d')
    .description('Divide two numbers')
    .argument('<a>', 'Dividend', numberArgument)
    .argument('<b>', 'Divisor', numberArgument)
    .action((a: number, b: number) => report(() => `${formatNumber(a)} / ${formatNumber(b)} = ${formatNumber(divide(a, b))}`));

program
    .command('power')
    .alias('p')
    .description('Calculate power (a^b)')
    .argument('<base>', 'Base', numberArgument)
    .argument('<exp>', 'Exponent', numberArgument)
    .action((base: number, exp: number) => report(() => `${formatNumber(base)}^${formatNumber(exp)} = ${formatNumber(power(base, exp))}`));

program
    .command('square-root')
    .alias('sqrt')
    .description('Calculate square root')
    .argument('<number>', 'Number to calculate square root', numberArgument)
    .action((value: number) => report(() => `√${formatNumber(value)} = ${formatNumber(squareRoot(value))}`));

program
    .command('eval')
    .alias('e')
    .description('Evaluate mathematical expression')
    .argument('<expression>', 'Mathematical expression (e.g., "2 + 3 * 4")')
    .action((expression: string) => report(() => `${expression} = ${formatNumber(evaluateExpression(expression))}`));

program
    .command('interactive')
    .alias('i')
    .description('Interactive mode')
    .action(runInteractive);

program.parse();
