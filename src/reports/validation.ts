import { ValidationError } from '../types/errors';
import { isDateRangePreset } from '../utils/date';
import { DateRangeSpec, ReportConfig, SECTION_TYPES, SectionConfig, SectionParameters, SectionType } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDate(value: unknown, field: string): Date {
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} must be a date or ISO date string`, field);
  }
  return date;
}

function validateDateRange(value: unknown): DateRangeSpec {
  if (typeof value === 'string') {
    if (!isDateRangePreset(value)) {
      throw new ValidationError(`Unknown date range preset: ${value}`, 'dateRange');
    }
    return value;
  }

  if (!isRecord(value)) {
    throw new ValidationError('dateRange must be a preset name or {start, end}', 'dateRange');
  }

  const start = toDate(value.start, 'dateRange.start');
  const end = toDate(value.end, 'dateRange.end');
  if (start.getTime() >= end.getTime()) {
    throw new ValidationError('dateRange.start must be before dateRange.end', 'dateRange');
  }
  return { start, end };
}

function isSectionType(value: unknown): value is SectionType {
  return typeof value === 'string' && (SECTION_TYPES as readonly string[]).includes(value);
}

function validateParameters(value: unknown, sectionName: string): SectionParameters | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ValidationError(`Section "${sectionName}" parameters must be an object`, 'parameters');
  }

  const parameters: SectionParameters = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string' && typeof entry !== 'number' && typeof entry !== 'boolean') {
      throw new ValidationError(
        `Section "${sectionName}" parameter "${key}" must be a string, number or boolean`,
        'parameters'
      );
    }
    parameters[key] = entry;
  }
  return parameters;
}

function validateSection(value: unknown, index: number): SectionConfig {
  if (!isRecord(value)) {
    throw new ValidationError(`Section ${index + 1} must be an object`, 'sections');
  }

  const { name, type } = value;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ValidationError(`Section ${index + 1} is missing a name`, 'sections');
  }
  if (!isSectionType(type)) {
    throw new ValidationError(
      `Unknown section type "${String(type)}" in section "${name}". Valid types: ${SECTION_TYPES.join(', ')}`,
      'sections'
    );
  }

  const parameters = validateParameters(value.parameters, name);
  return parameters ? { name, type, parameters } : { name, type };
}

/**
 * Check a report request and return it typed.
 * Throws ValidationError naming the first problem found.
 */
export function validateReportConfig(input: unknown): ReportConfig {
  if (!isRecord(input)) {
    throw new ValidationError('Report config must be an object');
  }

  if (typeof input.name !== 'string' || input.name.trim() === '') {
    throw new ValidationError('Report config is missing a name', 'name');
  }
  if (input.dateRange === undefined) {
    throw new ValidationError('Report config is missing a dateRange', 'dateRange');
  }
  if (!Array.isArray(input.sections) || input.sections.length === 0) {
    throw new ValidationError('Report config needs at least one section', 'sections');
  }

  const sections = input.sections.map((section: unknown, index: number) => validateSection(section, index));
  const seen = new Set<string>();
  for (const section of sections) {
    if (seen.has(section.name)) {
      throw new ValidationError(`Duplicate section name "${section.name}"`, 'sections');
    }
    seen.add(section.name);
  }

  return {
    name: input.name,
    dateRange: validateDateRange(input.dateRange),
    sections,
  };
}
