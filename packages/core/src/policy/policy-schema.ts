/**
 * Policy Document Schema
 *
 * @license Apache-2.0
 *
 * Zod schema for the on-disk policy document. Structural checks live
 * here; duplicate and cross-reference checks run in the policy store
 * once the document is structurally valid.
 */

import { z } from 'zod';
import { POLICY_SCHEMA_VERSION } from '../types.js';
import { parseTimestamp } from './timestamps.js';

const nonBlank = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .refine(value => value.trim().length > 0, { message: `${field} must be a non-empty string` });

const list = <T extends z.ZodTypeAny>(item: T, field: string) =>
  z.array(item, { required_error: `${field} must be a list`, invalid_type_error: `${field} must be a list` });

export const PolicyEntrySchema = z.object({
  name: nonBlank('name'),
  reason: nonBlank('reason'),
  remediation: nonBlank('remediation'),
  risk_score: z
    .number({ required_error: 'risk_score is required', invalid_type_error: 'risk_score must be a number' })
    .int('risk_score must be an integer in [0, 100]')
    .min(0, 'risk_score must be an integer in [0, 100]')
    .max(100, 'risk_score must be an integer in [0, 100]'),
});

export const TransitionSchema = z.object({
  crate: nonBlank('crate'),
  status: z.enum(['active', 'resolved'], {
    errorMap: () => ({ message: 'status must be active or resolved' }),
  }),
  owner: nonBlank('owner'),
  replacement_issue: nonBlank('replacement_issue'),
  expires_at_utc: z
    .string({ required_error: 'expires_at_utc is required', invalid_type_error: 'expires_at_utc must be a string' })
    .refine(value => parseTimestamp(value) !== null, {
      message: 'expires_at_utc must be an ISO-8601 timestamp with an explicit timezone offset',
    }),
  notes: z.string({ invalid_type_error: 'notes must be a string' }).default(''),
});

export const ProfileSchema = z.object({
  id: nonBlank('id'),
  target: nonBlank('target'),
  all_features: z.boolean({ invalid_type_error: 'all_features must be a boolean' }).default(false),
  no_default_features: z.boolean({ invalid_type_error: 'no_default_features must be a boolean' }).default(false),
  features: list(z.string({ invalid_type_error: 'features must be a list of strings' }), 'features').default([]),
});

export const PolicyDocumentSchema = z.object({
  schema_version: z.literal(POLICY_SCHEMA_VERSION, {
    errorMap: () => ({ message: `unsupported or missing schema_version (expected ${POLICY_SCHEMA_VERSION})` }),
  }),
  profiles: list(ProfileSchema, 'profiles'),
  forbidden_crates: list(PolicyEntrySchema, 'forbidden_crates'),
  conditional_crates: list(PolicyEntrySchema, 'conditional_crates'),
  transitions: list(TransitionSchema, 'transitions'),
  risk_thresholds: z.object(
    {
      high: z
        .number({ required_error: 'high must be an integer', invalid_type_error: 'high must be an integer' })
        .int('high must be an integer'),
    },
    { required_error: 'risk_thresholds is required', invalid_type_error: 'risk_thresholds must be an object' }
  ),
  output: z.object(
    {
      summary_path: z.string({ required_error: 'summary_path must be a string', invalid_type_error: 'summary_path must be a string' }),
      log_path: z.string({ required_error: 'log_path must be a string', invalid_type_error: 'log_path must be a string' }),
    },
    { required_error: 'output is required', invalid_type_error: 'output must be an object' }
  ),
});

export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;
export type RawPolicyEntry = z.infer<typeof PolicyEntrySchema>;
export type RawTransition = z.infer<typeof TransitionSchema>;
export type RawProfile = z.infer<typeof ProfileSchema>;

/**
 * Render a zod issue path as `forbidden_crates[2].risk_score`.
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = formatIssuePath(issue.path);
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}
