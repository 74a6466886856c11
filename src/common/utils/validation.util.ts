import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestException({
      message: 'validation failed',
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export function parseOptionalInt(
  value: unknown,
  fieldName: string,
  bounds: { min?: number; max?: number } = {},
): number | undefined {
  if (value == null || value === '') {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new BadRequestException(`${fieldName} must be a number`);
  }
  const int = Math.floor(parsed);
  if (
    (bounds.min != null && int < bounds.min) ||
    (bounds.max != null && int > bounds.max)
  ) {
    throw new BadRequestException(
      `${fieldName} must be between ${bounds.min ?? '-inf'} and ` +
        `${bounds.max ?? 'inf'}`,
    );
  }
  return int;
}

export function parseBoolean(value: unknown, fieldName: string): boolean {
  if (value == null || value === '') {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
  }
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'y'].includes(lowered)) {
      return true;
    }
    if (['0', 'false', 'no', 'n'].includes(lowered)) {
      return false;
    }
  }

  throw new BadRequestException(`${fieldName} must be a boolean value`);
}
