import { ValidationError } from 'class-validator';

/**
 * Collects every constraint message of a class-validator result,
 * nested children included.
 */
export function flattenValidationErrors(errors: ValidationError[]): string[] {
  const messages: string[] = [];

  for (const error of errors) {
    messages.push(...Object.values(error.constraints ?? {}));
    if (error.children && error.children.length > 0) {
      messages.push(...flattenValidationErrors(error.children));
    }
  }

  return messages;
}
