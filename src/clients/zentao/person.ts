/**
 * ZenTao returns people either as a user record (`{account, realname, ...}`)
 * or as a bare account string, depending on endpoint and version.
 */

export type PersonRef =
  | { kind: 'structured'; name: string }
  | { kind: 'raw'; value: string };

export function parsePersonRef(value: unknown): PersonRef | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'object' && !Array.isArray(value)) {
    const name = 'realname' in value && typeof value.realname === 'string' ? value.realname : '';
    return { kind: 'structured', name };
  }
  return { kind: 'raw', value: String(value) };
}

/**
 * Display name of a person field; '' when the field is absent
 */
export function personName(value: unknown): string {
  const ref = parsePersonRef(value);
  if (!ref) return '';
  switch (ref.kind) {
    case 'structured':
      return ref.name;
    case 'raw':
      return ref.value;
  }
}
