import { describe, it, expect } from 'vitest';
import {
  MindError,
  ConfigError,
  StorageError,
  StateCorruptionError,
  MalformedTriggerError,
  PlatformIOError,
  PromotionError,
} from '../errors.js';

describe('Error hierarchy', () => {
  const errorClasses = [
    { Class: ConfigError, name: 'ConfigError' },
    { Class: StorageError, name: 'StorageError' },
    { Class: StateCorruptionError, name: 'StateCorruptionError' },
    { Class: MalformedTriggerError, name: 'MalformedTriggerError' },
    { Class: PlatformIOError, name: 'PlatformIOError' },
    { Class: PromotionError, name: 'PromotionError' },
  ];

  for (const { Class, name } of errorClasses) {
    it(`${name} is instanceof MindError and Error`, () => {
      const err = new Class('test message');
      expect(err).toBeInstanceOf(MindError);
      expect(err).toBeInstanceOf(Error);
      expect(err.message).toBe('test message');
      expect(err.name).toBe(name);
    });

    it(`${name} preserves cause`, () => {
      const cause = new Error('root cause');
      const err = new Class('wrapper', cause);
      expect(err.cause).toBe(cause);
    });
  }

  it('MindError itself works correctly', () => {
    const err = new MindError('base error');
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('base error');
    expect(err.name).toBe('MindError');
  });
});
