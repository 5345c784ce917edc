import { describe, it, expect } from 'vitest';
import { parseSwitch } from '../commands/environment/debug';
import { parseMount } from '../commands/environment/site';

describe('parseMount', () => {
  it('should split source and target on the first colon', () => {
    expect(parseMount('~/shared:/shared')).toEqual({ source: '~/shared', target: '/shared' });
  });

  it('should reject a mount without a target', () => {
    expect(() => parseMount('~/shared')).toThrow('mount "~/shared" must look like <source>:<target>');
    expect(() => parseMount('~/shared:')).toThrow('must look like <source>:<target>');
  });
});

describe('parseSwitch', () => {
  it('should accept on and off', () => {
    expect(parseSwitch('on')).toBe(true);
    expect(parseSwitch('off')).toBe(false);
  });

  it('should reject anything else', () => {
    expect(() => parseSwitch('yes')).toThrow('expected "on" or "off", got "yes"');
  });
});
