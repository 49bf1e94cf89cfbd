/**
 * Input validation for ROS 2 topic names used in configuration.
 */

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

/**
 * Regex for valid ROS2 name segments (between slashes).
 * Each segment must be alphanumeric or underscore, starting with a letter or underscore.
 */
const ROS2_NAME_SEGMENT = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Validates an absolute ROS 2 topic name.
 *
 * Rules:
 * - Must start with `/`
 * - No double slashes, no trailing slash
 * - Each segment must be alphanumeric + underscores, not starting with a digit
 */
export function validateTopicName(name: string): ValidationResult {
  if (name.length === 0) {
    return { valid: false, error: 'Topic name must be a non-empty string' };
  }

  if (name[0] !== '/') {
    return { valid: false, error: `Topic name must start with '/': ${name}` };
  }

  if (name.includes('//')) {
    return { valid: false, error: `Topic name must not contain double slashes '//': ${name}` };
  }

  if (name.endsWith('/')) {
    return { valid: false, error: `Topic name must not end with a trailing '/': ${name}` };
  }

  for (const segment of name.slice(1).split('/')) {
    if (!ROS2_NAME_SEGMENT.test(segment)) {
      return {
        valid: false,
        error: `Topic name contains invalid segment '${segment}'`,
      };
    }
  }

  return { valid: true };
}
