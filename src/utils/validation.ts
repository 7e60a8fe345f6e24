/**
 * Field-level readers for untyped input (JSON payloads, config files).
 * Each reader records a ValidationIssue instead of throwing so that every
 * problem in a document is reported at once.
 */

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatIssues(issues: readonly ValidationIssue[]): string[] {
  return issues.map(issue => `${issue.field}: ${issue.message}`);
}

export class FieldReader {
  readonly issues: ValidationIssue[];

  constructor(
    private readonly source: Record<string, unknown>,
    private readonly prefix = '',
    issues: ValidationIssue[] = []
  ) {
    this.issues = issues;
  }

  /**
   * Read from an untyped value, recording an issue when it is not an object
   */
  static from(value: unknown, prefix = '', issues: ValidationIssue[] = []): FieldReader {
    if (isRecord(value)) {
      return new FieldReader(value, prefix, issues);
    }
    issues.push({ field: prefix || '(root)', message: 'must be an object', value });
    return new FieldReader({}, prefix, issues);
  }

  get valid(): boolean {
    return this.issues.length === 0;
  }

  has(field: string): boolean {
    return this.source[field] !== undefined;
  }

  path(field: string): string {
    return this.prefix ? `${this.prefix}.${field}` : field;
  }

  /**
   * Nested object reader sharing this reader's issue list. A missing nested
   * object reads as empty so that its fields fall back to defaults.
   */
  object(field: string): FieldReader {
    const value = this.source[field];
    if (value === undefined) {
      return new FieldReader({}, this.path(field), this.issues);
    }
    return FieldReader.from(value, this.path(field), this.issues);
  }

  array(field: string, fallback?: unknown[]): unknown[] {
    const value = this.source[field];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (!Array.isArray(value)) {
      this.fail(field, 'must be an array', value);
      return [];
    }
    return value;
  }

  string(field: string, fallback?: string, allowEmpty = false): string {
    const value = this.source[field];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value !== 'string' || (!allowEmpty && value.trim() === '')) {
      this.fail(field, allowEmpty ? 'must be a string' : 'must be a non-empty string', value);
      return fallback ?? '';
    }
    return value;
  }

  number(field: string, rule: NumberRule = {}, fallback?: number): number {
    const value = this.source[field];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    return this.checkNumber(field, value, rule) ?? fallback ?? 0;
  }

  nullableNumber(field: string, rule: NumberRule = {}): number | null {
    const value = this.source[field];
    if (value === undefined || value === null) {
      return null;
    }
    return this.checkNumber(field, value, rule);
  }

  boolean(field: string, fallback?: boolean): boolean {
    const value = this.source[field];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      this.fail(field, 'must be a boolean', value);
      return fallback ?? false;
    }
    return value;
  }

  oneOf<T extends string>(field: string, allowed: readonly T[], fallback?: T): T {
    const value = this.source[field];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      this.fail(field, `must be one of ${allowed.join(', ')}`, value);
      return fallback ?? allowed[0];
    }
    return match;
  }

  /**
   * ISO-8601 timestamp (or epoch milliseconds)
   */
  date(field: string): Date {
    const value = this.source[field];
    const parsed = value instanceof Date
      ? new Date(value.getTime())
      : typeof value === 'string' || typeof value === 'number'
        ? new Date(value)
        : null;

    if (parsed === null || Number.isNaN(parsed.getTime()) || (typeof value === 'string' && value.trim() === '')) {
      this.fail(field, 'must be an ISO-8601 timestamp', value);
      return new Date(0);
    }
    return parsed;
  }

  stringArray(field: string, fallback?: string[]): string[] {
    const value = this.source[field];
    if (value === undefined && fallback !== undefined) {
      return fallback;
    }
    if (!Array.isArray(value)) {
      this.fail(field, 'must be an array of strings', value);
      return [];
    }

    const strings: string[] = [];
    value.forEach((item: unknown, index) => {
      if (typeof item === 'string') {
        strings.push(item);
      } else {
        this.issues.push({ field: `${this.path(field)}[${index}]`, message: 'must be a string', value: item });
      }
    });
    return strings;
  }

  fail(field: string, message: string, value?: unknown): void {
    this.issues.push({ field: this.path(field), message, value });
  }

  private checkNumber(field: string, value: unknown, rule: NumberRule): number | null {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail(field, 'must be a number', value);
      return null;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.fail(field, 'must be an integer', value);
      return null;
    }
    if (rule.min !== undefined && value < rule.min) {
      this.fail(field, rule.max !== undefined ? `must be between ${rule.min} and ${rule.max}` : `must be at least ${rule.min}`, value);
      return null;
    }
    if (rule.max !== undefined && value > rule.max) {
      this.fail(field, rule.min !== undefined ? `must be between ${rule.min} and ${rule.max}` : `must be at most ${rule.max}`, value);
      return null;
    }
    return value;
  }
}
