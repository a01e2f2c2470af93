/**
 * AIGCAP v1 Validate
 *
 * Checks a HeaderModel against the grammar before it is written.
 * Returns every issue found rather than stopping at the first.
 */

import type {
  FileTypeDialect,
  HeaderModel,
  SymbolEntry,
  ValidationError,
  ValidationResult,
} from './types.js';
import { COVERAGE_TYPES, QUOTED_NAME_REGEX, SECTION_ORDER } from './constants.js';

/**
 * Validate a HeaderModel.
 *
 * Checks:
 * - Coverage type is one of the known categories
 * - At least one detail section is non-empty
 * - Symbol and library names are non-empty and contain no whitespace
 * - Line ranges satisfy 1 <= start <= end
 * - Library reasons are non-empty and single-line
 * - When a dialect is given, no text contains its closing delimiter
 */
export function validateHeader(header: HeaderModel, dialect?: FileTypeDialect): ValidationResult {
  const errors: ValidationError[] = [];

  if (!(COVERAGE_TYPES as readonly string[]).includes(header.coverageType)) {
    errors.push({
      field: 'coverageType',
      message: `Unknown coverage type: "${header.coverageType}"`,
    });
  }

  if (SECTION_ORDER.every((key) => header[key].length === 0)) {
    errors.push({
      field: 'sections',
      message: 'At least one of METHOD, STRUCTS, TRAIT or IMPORTED LIBRARY must list an entry',
    });
  }

  errors.push(...validateSymbols('methods', header.methods));
  errors.push(...validateSymbols('structs', header.structs));
  errors.push(...validateSymbols('traits', header.traits));

  header.libraries.forEach((lib, i) => {
    const field = `libraries[${i}]`;
    errors.push(...validateName(`${field}.name`, lib.name));

    if (lib.reason.trim() === '') {
      errors.push({ field: `${field}.reason`, message: 'Library reason is required' });
    } else if (/[\r\n]/.test(lib.reason)) {
      errors.push({ field: `${field}.reason`, message: 'Library reason must be a single line' });
    } else if (lib.reason !== lib.reason.trim()) {
      errors.push({
        field: `${field}.reason`,
        message: 'Library reason must not start or end with whitespace',
      });
    }
  });

  if (dialect) {
    errors.push(...validateDelimiters(header, dialect));
  }

  return { valid: errors.length === 0, errors };
}

function validateSymbols(section: string, entries: SymbolEntry[]): ValidationError[] {
  const errors: ValidationError[] = [];

  entries.forEach((entry, i) => {
    const field = `${section}[${i}]`;
    errors.push(...validateName(`${field}.name`, entry.name));

    if (entry.extent.kind === 'lines') {
      const { start, end } = entry.extent;
      if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 1 || end < start) {
        errors.push({
          field: `${field}.extent`,
          message: `Invalid line range ${start}~${end} (expected 1 <= start <= end)`,
        });
      }
    }
  });

  return errors;
}

function validateName(field: string, name: string): ValidationError[] {
  if (name === '') {
    return [{ field, message: 'Name is required' }];
  }
  if (/\s/.test(name)) {
    return [{ field, message: `Name must not contain whitespace: "${name}"` }];
  }
  if (QUOTED_NAME_REGEX.test(name)) {
    return [{ field, message: `Name must not be quoted: ${name}` }];
  }
  return [];
}

/** A closing delimiter inside the text would end the comment early */
function validateDelimiters(header: HeaderModel, dialect: FileTypeDialect): ValidationError[] {
  if (dialect.style.kind !== 'block') return [];
  const close = dialect.style.close;
  const errors: ValidationError[] = [];

  const check = (field: string, value: string) => {
    if (value.includes(close)) {
      errors.push({ field, message: `Must not contain the comment terminator "${close}"` });
    }
  };

  for (const key of ['methods', 'structs', 'traits'] as const) {
    header[key].forEach((entry, i) => check(`${key}[${i}].name`, entry.name));
  }
  header.libraries.forEach((lib, i) => {
    check(`libraries[${i}].name`, lib.name);
    check(`libraries[${i}].reason`, lib.reason);
  });

  return errors;
}
