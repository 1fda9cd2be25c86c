import { ValueTransformer } from 'typeorm';

/**
 * pg hands `numeric` columns back as strings, sqlite as numbers.
 */
export class NumericColumnTransformer implements ValueTransformer {
  to(value: number | null | undefined): number | null | undefined {
    return value;
  }

  from(value: string | number | null): number | null {
    if (value === null) {
      return null;
    }
    return Number(value);
  }
}

export const numericTransformer = new NumericColumnTransformer();
