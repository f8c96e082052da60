import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { CLIUtils } from '../src/cli';

describe('CLIUtils', () => {
    it('should create a named program', () => {
        const program = CLIUtils.createProgram('tool', 'Does things', '2.0.0');

        expect(program.name()).toBe('tool');
        expect(program.description()).toBe('Does things');
        expect(program.version()).toBe('2.0.0');
    });

    it('should pad columns to the widest cell', () => {
        chalk.level = 0;

        expect(CLIUtils.formatTable(['URL', 'N'], [['a', 1], ['longer', null]])).toEqual([
            'URL     N  ',
            '------- --',
            'a       1  ',
            'longer     ',
        ]);
    });

    it('should say when there is nothing to show', () => {
        chalk.level = 0;

        expect(CLIUtils.formatTable(['URL'], [])).toEqual(['(No data)']);
    });
});
