import { describe, it, expect } from 'vitest';
import { parsePersonRef, personName } from './person.js';

describe('person references', () => {
  it('should read the display name of a user record', () => {
    expect(parsePersonRef({ account: 'dev', realname: 'Dev One' })).toEqual({ kind: 'structured', name: 'Dev One' });
    expect(personName({ account: 'dev', realname: 'Dev One' })).toBe('Dev One');
  });

  it('should use an empty name for a record without realname', () => {
    expect(personName({ account: 'dev' })).toBe('');
  });

  it('should keep bare values as strings', () => {
    expect(parsePersonRef('admin')).toEqual({ kind: 'raw', value: 'admin' });
    expect(personName(42)).toBe('42');
  });

  it('should treat an absent field as empty', () => {
    expect(parsePersonRef(undefined)).toBeNull();
    expect(personName(null)).toBe('');
  });
});
