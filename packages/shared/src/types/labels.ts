/**
 * Labels and the label names that drive DNS publication
 * @module @kuberoute/shared/types/labels
 */

/**
 * Labels are key-value pairs attached to Kubernetes objects
 *
 * @example
 * {
 *   "app": "testapp",
 *   "kuberoute_domain": "example.com",
 *   "kuberoute_name": "app"
 * }
 */
export type Labels = Record<string, string>;

/**
 * Names of the service labels read by the record planner
 */
export interface LabelNames {
  /** Label holding the DNS zone, e.g. `example.com` */
  domain: string;
  /** Label holding the subdomain part, e.g. `app` */
  name: string;
  /** Label holding the failover hostname or address */
  failover: string;
  /** Label holding the minimum node coverage in percent */
  quota: string;
}

/**
 * Default label names
 */
export const DEFAULT_LABEL_NAMES: LabelNames = {
  domain: 'kuberoute_domain',
  name: 'kuberoute_name',
  failover: 'kuberoute_failover',
  quota: 'kuberoute_quota',
};

/**
 * Keys of `LabelNames`
 */
export const LABEL_NAME_KEYS: readonly (keyof LabelNames)[] = ['domain', 'name', 'failover', 'quota'];

/**
 * Check if labels carry every key-value pair of `required`.
 * An empty `required` set matches any labels.
 */
export function matchesLabels(labels: Labels, required: Labels): boolean {
  for (const [key, value] of Object.entries(required)) {
    if (labels[key] !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Read a label, returning its trimmed value or undefined when missing or blank
 */
export function readLabel(labels: Labels, key: string): string | undefined {
  const value = labels[key];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Validate a label key
 * - Must be non-empty
 * - Optional prefix (DNS subdomain) followed by /
 * - Name part 1-63 characters, alphanumeric at both ends,
 *   dash, underscore and dot inside
 */
export function isValidLabelKey(key: string): boolean {
  if (!key || key.length > 253) {
    return false;
  }

  const parts = key.split('/');
  if (parts.length > 2) {
    return false;
  }

  const name = parts.length === 2 ? parts[1] : parts[0];

  if (!name || name.length > 63) {
    return false;
  }

  return /^[a-zA-Z0-9]([a-zA-Z0-9._-]*[a-zA-Z0-9])?$/.test(name);
}
