import chalk from 'chalk';
import { ParseError, ValidationError } from '../../types/errors';
import { SectionParameters } from '../../reports/types';
import { TemplateOverrides } from '../../reports/builder';
import { isDateRangePreset } from '../../utils/date';
import { formatJsonReport } from '../../reports/formatters/json';
import { resolveFormat, withEngine, fail } from '../context';
import { printBuiltReport, readReportConfigFile } from './build';

interface TemplateOptions {
  description?: string;
  param?: string[];
  range?: string;
  format?: string;
}

/**
 * Collect repeated --param values
 */
export function collectParam(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function coerceParamValue(raw: string): string | number | boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return parseFloat(raw);
  return raw;
}

/**
 * Parse "section.key=value" overrides into per-section parameters.
 * The section name is everything before the last dot of the left side.
 */
export function parseParamOverrides(params: readonly string[]): Record<string, SectionParameters> {
  const overrides: Record<string, SectionParameters> = {};

  for (const param of params) {
    const match = param.match(/^(.+)\.([\w-]+)=(.*)$/);
    if (!match) {
      throw new ParseError('Expected section.key=value', param);
    }
    const [, section, key, raw] = match;
    overrides[section] = { ...overrides[section], [key]: coerceParamValue(raw) };
  }

  return overrides;
}

/**
 * focus template command implementation
 * Manages saved report templates
 */
export function templateCommand(subcommand: string | undefined, args: string[], options: TemplateOptions): void {
  try {
    withEngine((engine) => {
      switch (subcommand ?? 'list') {
        case 'list': {
          const templates = engine.templates.listTemplates();
          console.log(chalk.bold('\nReport Templates:\n'));
          for (const template of templates) {
            const origin = template.builtIn ? chalk.gray(' (built-in)') : '';
            console.log(`  ${chalk.cyan(template.name.padEnd(20))} ${template.description ?? ''}${origin}`);
          }
          console.log();
          break;
        }

        case 'show': {
          const template = engine.templates.loadTemplate(requireArg(args, 0, 'template name'));
          console.log(formatJsonReport(template.config));
          break;
        }

        case 'save': {
          const name = requireArg(args, 0, 'template name');
          const config = readReportConfigFile(requireArg(args, 1, 'config file'));
          engine.templates.saveTemplate(name, config, options.description);
          console.log(chalk.green(`✓ Saved template ${chalk.cyan(name)}`));
          break;
        }

        case 'delete': {
          const name = requireArg(args, 0, 'template name');
          if (!engine.templates.deleteTemplate(name)) {
            throw new ValidationError(`Template "${name}" cannot be deleted`, 'name');
          }
          console.log(chalk.green(`✓ Deleted template ${chalk.cyan(name)}`));
          break;
        }

        case 'run': {
          const name = requireArg(args, 0, 'template name');
          const format = resolveFormat(options.format);
          const overrides: TemplateOverrides = { parameters: parseParamOverrides(options.param ?? []) };
          if (options.range) {
            if (!isDateRangePreset(options.range)) {
              throw new ValidationError(`Unknown range "${options.range}"`, 'range');
            }
            overrides.dateRange = options.range;
          }
          printBuiltReport(engine.builder.buildFromTemplate(name, overrides), format);
          break;
        }

        default:
          throw new ValidationError(
            `Unknown subcommand '${subcommand}'. Available subcommands: list, show, save, delete, run`,
            'subcommand'
          );
      }
    });
  } catch (error) {
    fail(error);
  }
}

function requireArg(args: readonly string[], index: number, label: string): string {
  const value = args[index];
  if (!value) {
    throw new ValidationError(`Missing ${label}`, label);
  }
  return value;
}
