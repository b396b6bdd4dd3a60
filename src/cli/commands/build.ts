import { readFileSync } from 'fs';
import { ParseError, errorMessage } from '../../types/errors';
import { BuiltReport } from '../../reports/types';
import { formatTerminalBuiltReport } from '../../reports/formatters/terminal';
import { formatJsonReport } from '../../reports/formatters/json';
import { OutputFormat, resolveFormat, withEngine, fail } from '../context';

interface BuildOptions {
  format?: string;
}

/**
 * Read a report config from a JSON file
 */
export function readReportConfigFile(file: string): unknown {
  let contents: string;
  try {
    contents = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ParseError(`Cannot read ${file}: ${errorMessage(error)}`);
  }

  try {
    const parsed: unknown = JSON.parse(contents);
    return parsed;
  } catch (error) {
    throw new ParseError(`${file} is not valid JSON: ${errorMessage(error)}`);
  }
}

export function printBuiltReport(report: BuiltReport, format: OutputFormat): void {
  console.log(format === 'json' ? formatJsonReport(report) : formatTerminalBuiltReport(report));
}

/**
 * focus build command implementation
 * Builds a custom report from a JSON config file
 */
export function buildCommand(file: string, options: BuildOptions): void {
  try {
    const config = readReportConfigFile(file);
    const format = resolveFormat(options.format);

    withEngine((engine) => {
      printBuiltReport(engine.builder.build(config), format);
    });
  } catch (error) {
    fail(error);
  }
}
