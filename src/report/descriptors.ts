import * as z from 'zod';
import type { ImageDescriptor } from './model.js';

/**
 * Validation of caller-supplied figure/diagram lists.
 *
 * A bad descriptor list is a broken caller contract, not a malformed document,
 * so unlike everything else in rendering it fails hard.
 */
export const imageDescriptorSchema = z.object({
  path: z.string().min(1),
  caption: z.string().default(''),
});

export const imageDescriptorListSchema = z.array(imageDescriptorSchema);

function formatIssue(label: string, issue: z.ZodIssue): string {
  if (issue.path.length === 0) return issue.message;
  const path = issue.path.reduce<string>(
    (out, segment) => (typeof segment === 'number' ? `${out}[${segment}]` : `${out}.${segment}`),
    label
  );
  return `${path}: ${issue.message}`;
}

/**
 * Validate an already-parsed descriptor list.
 *
 * `label` names the list in error messages (ex: `images[1].path: Required`).
 */
export function parseDescriptorList(label: string, value: unknown): ImageDescriptor[] {
  const result = imageDescriptorListSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => formatIssue(label, issue))
      .join('; ');
    throw new Error(`Invalid ${label}: ${details}`);
  }
  return result.data;
}

/**
 * Parse and validate a JSON descriptor list (as passed on the command line).
 */
export function parseDescriptorListJson(label: string, json: string): ImageDescriptor[] {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid ${label}: not valid JSON (${reason})`);
  }
  return parseDescriptorList(label, value);
}
