import { isMapping, lookup } from './resource-manifest';

describe('lookup', () => {
  const content = {
    status: {
      desired: { version: '4.10.3' },
      history: [{ version: '4.10.0' }, { version: '4.10.3' }],
    },
  };

  it('should walk nested mappings', () => {
    expect(lookup(content, ['status', 'desired', 'version'])).toBe('4.10.3');
  });

  it('should index sequences with numeric keys', () => {
    expect(lookup(content, ['status', 'history', 1, 'version'])).toBe('4.10.3');
    expect(lookup(content, ['status', 'history', 2, 'version'])).toBeUndefined();
    expect(lookup(content, ['status', 'history', -1])).toBeUndefined();
  });

  it('should return undefined for missing steps', () => {
    expect(lookup(content, ['status', 'current', 'version'])).toBeUndefined();
    expect(lookup(content, ['status', 'desired', 'version', 'major'])).toBeUndefined();
    expect(lookup(content, ['status', 'desired', 'toString'])).toBeUndefined();
    expect(lookup(null, ['status'])).toBeUndefined();
  });

  it('should return the value itself for an empty key list', () => {
    expect(lookup(content, [])).toBe(content);
  });
});

describe('isMapping', () => {
  it('should accept plain objects only', () => {
    expect(isMapping({})).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isMapping('text')).toBe(false);
  });
});
