import type { ExtendedAttributeValue } from '@pointforge/series-client';
import { ConfigurationError } from './errors';
import type { GradeMapping, QualifierMapping } from './types';

const MAX_GRADE_RANGE = 100_000;

function splitOnFirst(text: string, separator: string): [string, string] | null {
  const index = text.indexOf(separator);
  if (index < 0) {
    return null;
  }
  return [text.slice(0, index).trim(), text.slice(index + 1).trim()];
}

function parseGradeLiteral(text: string, rule: string): number {
  if (!/^[-+]?\d+$/.test(text)) {
    throw new ConfigurationError(`'${rule}' is not in sourceValue:mappedValue syntax.`);
  }
  return Number.parseInt(text, 10);
}

/**
 * Expands `low,high:mapped`, `grade:mapped` and `:mapped` rules into a sparse mapping.
 * An empty mapped side maps to "no grade". Later rules override earlier ones.
 * Returns `undefined` when no rules are given, which leaves grade mapping disabled.
 */
export function buildGradeMapping(rules: readonly string[]): GradeMapping | undefined {
  if (rules.length === 0) {
    return undefined;
  }

  const entries = new Map<number, number | null>();
  let defaultGrade: number | null = null;

  for (const rule of rules) {
    const components = splitOnFirst(rule, ':');
    if (!components) {
      throw new ConfigurationError(`'${rule}' is not in sourceValue:mappedValue syntax.`);
    }
    const [sourceText, mappedText] = components;
    const mapped = mappedText.length > 0 ? parseGradeLiteral(mappedText, rule) : null;

    if (sourceText.length === 0) {
      defaultGrade = mapped;
      continue;
    }

    const bounds = (splitOnFirst(sourceText, ',') ?? [sourceText])
      .map((bound) => parseGradeLiteral(bound, rule))
      .sort((a, b) => a - b);
    const low = bounds[0];
    const high = bounds.length > 1 ? bounds[1] : low;

    if (high - low >= MAX_GRADE_RANGE) {
      throw new ConfigurationError(`'${rule}' spans more than ${MAX_GRADE_RANGE} grades.`);
    }

    for (let grade = low; grade <= high; grade += 1) {
      entries.set(grade, mapped);
    }
  }

  return { entries, defaultGrade };
}

/**
 * Parses `source:mapped` qualifier rules. `:X` sets the default list to `[X]`; `:` clears it.
 * An empty mapped side removes the source qualifier.
 */
export function buildQualifierMapping(rules: readonly string[]): QualifierMapping | undefined {
  if (rules.length === 0) {
    return undefined;
  }

  const entries = new Map<string, string | null>();
  let defaultQualifiers: string[] | undefined;

  for (const rule of rules) {
    const components = splitOnFirst(rule, ':');
    if (!components) {
      throw new ConfigurationError(`'${rule}' is not in sourceValue:mappedValue syntax.`);
    }
    const [source, mappedText] = components;
    const mapped = mappedText.length > 0 ? mappedText : null;

    if (source.length === 0) {
      defaultQualifiers = mapped ? [mapped] : undefined;
      continue;
    }
    entries.set(source, mapped);
  }

  return defaultQualifiers ? { entries, defaultQualifiers } : { entries };
}

/** Parses `COLUMN@TABLE=value`; the value may be empty. */
export function parseExtendedAttribute(text: string): ExtendedAttributeValue {
  const components = splitOnFirst(text, '=');
  if (!components || components[0].length === 0) {
    throw new ConfigurationError(`'${text}' is not in COLUMN@TABLE=value syntax.`);
  }
  return { columnIdentifier: components[0], value: components[1] };
}
