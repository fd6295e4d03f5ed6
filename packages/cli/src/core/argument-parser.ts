/**
 * Argument Parser - `_key=value` run overrides
 */

import { z } from 'zod';
import { InvalidArgumentError } from '@delivery-filter/utils';

export const RUN_ARGUMENT_KEYS = [
  '_cityDistrict',
  '_firstDeliveryDateTime',
  '_deliveryLog',
  '_deliveryOrder',
] as const;

export const runArgumentKeySchema = z.enum(RUN_ARGUMENT_KEYS);

export type RunArgumentKey = z.infer<typeof runArgumentKeySchema>;

export type RunArguments = Partial<Record<RunArgumentKey, string>>;

export type RejectedToken = {
  token: string;
  reason: string;
};

export type ParsedRunArguments = {
  values: RunArguments;
  rejected: RejectedToken[];
};

/**
 * Split tokens into known key=value pairs and rejected tokens.
 *
 * The value is everything after the first `=`. When a key repeats, the first token wins.
 */
export function parseRunArguments(tokens: readonly string[]): ParsedRunArguments {
  const values: RunArguments = {};
  const rejected: RejectedToken[] = [];

  for (const token of tokens) {
    const separator = token.indexOf('=');
    if (separator <= 0) {
      rejected.push({ token, reason: 'expected key=value' });
      continue;
    }

    const key = runArgumentKeySchema.safeParse(token.slice(0, separator));
    if (!key.success) {
      rejected.push({
        token,
        reason: `unknown key, expected one of ${RUN_ARGUMENT_KEYS.join(', ')}`,
      });
      continue;
    }

    if (values[key.data] === undefined) {
      values[key.data] = token.slice(separator + 1);
    }
  }

  return { values, rejected };
}

/**
 * @throws InvalidArgumentError for the first rejected token
 */
export function assertValidRunArguments(parsed: ParsedRunArguments): RunArguments {
  const [first] = parsed.rejected;
  if (first) {
    throw new InvalidArgumentError(`Malformed argument "${first.token}": ${first.reason}`, first.token, {
      comment: `Failed to read argument ${first.token}`,
    });
  }
  return parsed.values;
}

/**
 * Value given for `key`, or `defaultValue` when it is missing or empty
 */
export function getArgumentValue(
  args: RunArguments,
  key: RunArgumentKey,
  defaultValue: string
): string {
  const value = args[key];
  return value ? value : defaultValue;
}
