import { ensureError, err, ok, type Result } from '@stakebook/shared';

export function tryJsonParse(input: string): Result<unknown, Error> {
  try {
    const value: unknown = JSON.parse(input);
    return ok(value);
  } catch (error: unknown) {
    return err(ensureError(error));
  }
}
