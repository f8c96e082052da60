import { Command } from 'commander';
import chalk from 'chalk';

export type TableCell = string | number | boolean | null | undefined;

export class CLIUtils {
    /**
     * Create a basic CLI program
     */
    static createProgram(name: string, description: string, version: string = '1.0.0'): Command {
        const program = new Command();
        program
            .name(name)
            .description(description)
            .version(version);
        return program;
    }

    /**
     * Render rows as padded columns. Returned instead of printed so callers decide the stream.
     */
    static formatTable(headers: string[], rows: TableCell[][]): string[] {
        if (rows.length === 0) {
            return [chalk.gray('(No data)')];
        }

        const widths = headers.map((h, i) => {
            const maxRow = Math.max(...rows.map(r => String(r[i] ?? '').length));
            return Math.max(h.length, maxRow) + 2;
        });

        return [
            headers.map((h, i) => chalk.bold(h.padEnd(widths[i]))).join(''),
            widths.map(w => '-'.repeat(w - 1)).join(' '),
            ...rows.map(row => row.map((cell, i) => String(cell ?? '').padEnd(widths[i])).join(''))
        ];
    }

    static printTable(headers: string[], rows: TableCell[][]): void {
        for (const line of CLIUtils.formatTable(headers, rows)) {
            console.log(line);
        }
    }

    static success(message: string): void {
        console.log(chalk.green('✔ ' + message));
    }

    static error(message: string): void {
        console.error(chalk.red('✖ ' + message));
    }

    static info(message: string): void {
        console.log(chalk.blue('ℹ ' + message));
    }

    static warn(message: string): void {
        console.log(chalk.yellow('⚠ ' + message));
    }
}
