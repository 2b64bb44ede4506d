/**
 * PHI redaction rules for clinical logging
 *
 * Paths are enumerated explicitly instead of wildcards so that a new field
 * never reaches the logs by accident. When a schema gains a PHI field, add it
 * here.
 */

/**
 * Resource fields that carry PHI, in camelCase (wire) and snake_case (row) form
 */
const PHI_FIELDS = [
  'mrn',
  'firstName',
  'first_name',
  'lastName',
  'last_name',
  'middleName',
  'middle_name',
  'birthDate',
  'birth_date',
  'phone',
  'phoneMobile',
  'phone_mobile',
  'email',
  'addressLine1',
  'address_line1',
  'city',
  'postalCode',
  'postal_code',
  'subscriberName',
  'subscriber_name',
  'subscriberId',
  'subscriber_id',
  'memberId',
  'member_id',
  'policyNumber',
  'policy_number',
  'note',
  'body',
  'conclusion',
  'reasonText',
  'reason_text',
  'preOpDiagnosis',
  'pre_op_diagnosis',
  'patientInstruction',
  'patient_instruction',
  'textDiv',
  'text_div',
];

/** Containers where request and response payloads appear in log objects */
const PAYLOAD_PREFIXES = ['input', 'record', 'req.body', 'res.body'];

/**
 * Standard paths to redact in log objects
 */
export const REDACTION_PATHS: string[] = [
  ...PHI_FIELDS,
  ...PAYLOAD_PREFIXES.flatMap((prefix) => PHI_FIELDS.map((field) => `${prefix}.${field}`)),

  // Authentication/credentials
  'password',
  'token',
  'secret',
  'authorization',
  'connectionString',
  'req.headers.authorization',
  'req.headers.cookie',
];

/**
 * Pino censor: keeps the field name so redacted entries stay searchable
 */
export function createCensor(_value: unknown, path: string[]): string {
  const fieldName = path[path.length - 1] ?? 'unknown';
  return `[REDACTED:${fieldName}]`;
}

/**
 * Patterns for PHI that leaks into free-form strings (error messages, SQL details)
 */
export const PHI_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  internationalPhone: /\+[1-9]\d{6,14}/g,
  ssn: /\b\d{3}-\d{2}-\d{4}\b/g,
  jwtToken: /\beyJ[A-Za-z0-9_-]*\.eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]*/g,
  postgresUrlCredentials: /(postgres(?:ql)?:\/\/[^:/\s]+):[^@\s]+@/g,
} as const;

/**
 * Redact PHI patterns from a string value
 *
 * Tokens go first so that their payload is not partially matched by the
 * other patterns.
 */
export function redactString(value: string): string {
  return value
    .replace(PHI_PATTERNS.jwtToken, '[REDACTED:token]')
    .replace(PHI_PATTERNS.postgresUrlCredentials, '$1:[REDACTED]@')
    .replace(PHI_PATTERNS.email, '[REDACTED:email]')
    .replace(PHI_PATTERNS.internationalPhone, '[REDACTED:phone]')
    .replace(PHI_PATTERNS.ssn, '[REDACTED:ssn]');
}

/**
 * Check if a path should be redacted
 */
export function shouldRedactPath(path: string): boolean {
  const normalizedPath = path.toLowerCase();
  return REDACTION_PATHS.some((redactPath) => {
    const normalizedRedact = redactPath.toLowerCase();
    return normalizedPath === normalizedRedact || normalizedPath.endsWith(`.${normalizedRedact}`);
  });
}
