import Ajv, { ErrorObject } from 'ajv';

/** Shared validator instance; schemas compile once at module load */
export const ajv = new Ajv({ allErrors: true, strict: false });

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return ajv.errorsText(errors, { separator: '; ' });
}
