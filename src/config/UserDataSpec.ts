import { z } from 'zod';
import { OverrideParseError, errorMessage } from '../common/errors';
import { isPlainObject } from '../common/utils';
import { MAX_TIMER_MS } from '../script/BoundedProcess';

/** Longest script deadline a timer can hold */
export const MAX_SCRIPT_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

/**
 * Operator overrides delivered through the user-data endpoint.
 * Every field is optional; a missing document means all defaults.
 */
export interface UserDataSpec {
  scylla_yaml?: Record<string, unknown> | undefined;
  post_configuration_script?: string | undefined;
  post_configuration_script_timeout?: number | undefined;
  start_scylla_on_first_boot?: boolean | undefined;
}

export const UserDataSpecSchema: z.ZodType<UserDataSpec> = z
  .object({
    scylla_yaml: z.record(z.unknown()).optional(),
    post_configuration_script: z.string().optional(),
    post_configuration_script_timeout: z.number().int().positive().max(MAX_SCRIPT_TIMEOUT_SECONDS).optional(),
    start_scylla_on_first_boot: z.boolean().optional()
  })
  .passthrough();

export const EMPTY_USER_DATA: Readonly<UserDataSpec> = Object.freeze({});

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');

/**
 * Parse and validate the raw user-data body once, before any merge happens.
 * An absent or blank body yields the empty spec.
 */
export function parseUserData(raw: string | undefined): UserDataSpec {
  if (raw === undefined || raw.trim() === '') {
    return EMPTY_USER_DATA;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new OverrideParseError(`User data is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  if (!isPlainObject(decoded)) {
    throw new OverrideParseError('User data must be a JSON object');
  }

  const result = UserDataSpecSchema.safeParse(decoded);
  if (!result.success) {
    throw new OverrideParseError(`Invalid user data: ${describeIssues(result.error)}`, { cause: result.error });
  }

  const { scylla_yaml, post_configuration_script, post_configuration_script_timeout, start_scylla_on_first_boot } =
    result.data;

  // Unknown top-level keys are dropped here
  return {
    ...(scylla_yaml !== undefined ? { scylla_yaml } : {}),
    ...(post_configuration_script !== undefined ? { post_configuration_script } : {}),
    ...(post_configuration_script_timeout !== undefined ? { post_configuration_script_timeout } : {}),
    ...(start_scylla_on_first_boot !== undefined ? { start_scylla_on_first_boot } : {})
  };
}
