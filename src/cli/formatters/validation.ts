/**
 * Human-readable validation report.
 */
import chalk from 'chalk';
import type { FileValidationResult, Violation } from '../../core/validation/types.js';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

export class ValidationFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  formatResult(result: FileValidationResult): string {
    const lines: string[] = [];

    const statusText = this.colorize(
      result.status.toUpperCase(),
      result.status === 'pass' ? 'green' : result.status === 'fail' ? 'red' : 'yellow'
    );
    lines.push(`${this.getStatusIcon(result.status)} ${statusText}: ${result.file}`);

    if (!result.exists) {
      lines.push(`   ${this.colorize('File not found, content checks skipped', 'dim')}`);
    }

    if (result.errors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${result.errors.length}):`, 'red')}`);
      for (const violation of result.errors) {
        lines.push(...this.formatViolation(violation));
      }
    }

    if (result.warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${result.warnings.length}):`, 'yellow')}`);
      for (const warning of result.warnings) {
        lines.push(...this.formatViolation(warning));
      }
    }

    return lines.join('\n');
  }

  formatBatch(results: FileValidationResult[]): string {
    const lines: string[] = [];

    for (const result of results) {
      lines.push(this.formatResult(result));
      lines.push('');
    }

    lines.push(this.formatSummary(results));

    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string[] {
    const location = violation.line ? `Line ${violation.line}: ` : '';
    const lines = [
      `      ${location}${violation.code} ${violation.rule}`,
      `        ${violation.message}`,
    ];

    if (violation.fixHint) {
      lines.push(`        ${this.colorize(`Fix: ${violation.fixHint}`, 'cyan')}`);
    }

    return lines;
  }

  private formatSummary(results: FileValidationResult[]): string {
    const count = (status: FileValidationResult['status']): number =>
      results.filter((r) => r.status === status).length;

    const passedText = this.colorize(`${count('pass')} passed`, 'green');
    const failedText = this.colorize(`${count('fail')} failed`, 'red');
    const warnedText = this.colorize(`${count('warn')} warnings`, 'yellow');

    return [
      '═'.repeat(60),
      `SUMMARY: ${passedText}, ${failedText}, ${warnedText}`,
      `Total files: ${results.length}`,
    ].join('\n');
  }

  private getStatusIcon(status: FileValidationResult['status']): string {
    switch (status) {
      case 'pass':
        return this.colorize('✓', 'green');
      case 'fail':
        return this.colorize('✗', 'red');
      case 'warn':
        return this.colorize('⚠', 'yellow');
    }
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
