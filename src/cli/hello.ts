#!/usr/bin/env node

/**
 * hello - prints a greeting, optionally repeated and uppercased
 */

import { Command } from 'commander';
import { DEFAULT_NAME, buildGreeting, parseCount } from './greeting';

const program = new Command();

program
    .name('hello')
    .description('A simple Hello World CLI tool')
    .version('0.1.0')
    .option('-n, --name <NAME>', 'Name to greet', DEFAULT_NAME)
    .option('-c, --count <NUMBER>', 'Number of times to greet', parseCount, 1)
    .option('-u, --uppercase', 'Display greeting in uppercase', false)
    .action((options: { name: string; count: number; uppercase: boolean }) => {
        for (const line of buildGreeting(options)) {
            console.log(line);
        }
    });

program.parse();
