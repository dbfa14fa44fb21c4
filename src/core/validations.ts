const ID_PATTERN = /^[a-zA-Z0-9\-._]+$/;

/**
 * Reports whether the value is present and non-empty.
 */
export function validString(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value !== "";
}

/**
 * Reports whether the value is usable as an identifier in a URL path.
 */
export function validStringID(value: string | null | undefined): value is string {
  return validString(value) && ID_PATTERN.test(value);
}
