import { z } from 'zod';

/**
 * Kubernetes namespace naming rules:
 * - Must be 63 characters or less
 * - Must start and end with alphanumeric
 * - Can contain lowercase alphanumeric and hyphens
 */
export const namespaceSchema = z
  .string()
  .min(1, 'Namespace cannot be empty')
  .max(63, 'Namespace must be 63 characters or less')
  .regex(
    /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/,
    'Namespace must be lowercase alphanumeric with hyphens, starting and ending with alphanumeric'
  );

/**
 * Equality-based label selector, e.g. `app=model-server` or
 * `cloud.google.com/compute-class=l4,tier=gpu`
 */
export const labelSelectorSchema = z
  .string()
  .min(1, 'Label selector cannot be empty')
  .regex(
    /^[A-Za-z0-9./_-]+=[A-Za-z0-9._-]*(,[A-Za-z0-9./_-]+=[A-Za-z0-9._-]*)*$/,
    'Label selector must be a comma-separated list of key=value pairs'
  );

/**
 * Manifest file names are resolved inside MANIFEST_DIR and may not escape it
 */
export const manifestFileSchema = z
  .string()
  .min(1, 'Manifest file cannot be empty')
  .regex(/^[A-Za-z0-9._-]+\.ya?ml$/, 'Manifest must be a .yaml or .yml file name without directories');
