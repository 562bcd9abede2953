import { ValidationPipe } from '@nestjs/common';
import { ValidationError as ConstraintViolation } from 'class-validator';
import { ValidationError } from '../errors/app-error';

/** Flattens nested class-validator results into one message per broken constraint. */
export function collectConstraintMessages(violations: ConstraintViolation[]): string[] {
  return violations.flatMap(violation => [
    ...Object.values(violation.constraints ?? {}),
    ...collectConstraintMessages(violation.children ?? []),
  ]);
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    forbidNonWhitelisted: true,
    exceptionFactory: (violations: ConstraintViolation[]) =>
      new ValidationError(
        'Validation error',
        'Invalid request data',
        collectConstraintMessages(violations),
      ),
  });
}
