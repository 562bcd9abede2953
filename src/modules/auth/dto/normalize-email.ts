import { Transform } from 'class-transformer';

/** Trims and lower-cases an incoming email before validation. */
export const NormalizeEmail = (): PropertyDecorator =>
  Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value));
