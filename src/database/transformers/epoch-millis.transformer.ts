import { ValueTransformer } from 'typeorm';

/**
 * Timestamps are stored as INTEGER epoch milliseconds and surfaced as Date.
 */
export const epochMillisTransformer: ValueTransformer = {
  to: (value: unknown) => (value instanceof Date ? value.getTime() : value),
  from: (value: number | null) => (value === null ? null : new Date(value)),
};
