import { BadRequestException, HttpException, UnprocessableEntityException } from '@nestjs/common';
import { z } from 'zod';
import { SnapshotParseError, ValidationError } from './errors';

export function parseWithSchema<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
): z.infer<TSchema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequestException({
      message: 'Request validation failed',
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

/** Maps analysis failures onto HTTP errors; anything else is left to Nest. */
export function toHttpException(error: unknown): HttpException | null {
  if (error instanceof SnapshotParseError) {
    return new BadRequestException({
      message: 'Snapshot could not be parsed',
      snapshot: error.source,
      kind: error.parseError.kind,
      field: error.parseError.field ?? null,
      detail: error.parseError.message,
    });
  }

  if (error instanceof ValidationError) {
    return new UnprocessableEntityException({
      message: 'Snapshots cannot be compared',
      kind: error.kind,
      context: error.context,
      detail: error.message,
    });
  }

  return null;
}
