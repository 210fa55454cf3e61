import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AdapterRegistry, type AdapterFactory } from '../registry.js';
import { UnsupportedFrameworkError } from '../../errors.js';
import { silentLogger } from '../../logger.js';

interface FakeConfig {
  name: string;
}

interface FakeAdapter {
  label: string;
}

describe('AdapterRegistry', () => {
  let registry: AdapterRegistry<FakeConfig, FakeAdapter>;

  const createFactory = (label: string): AdapterFactory<FakeConfig, FakeAdapter> => ({
    createClient: (config) => ({ label: `${label}:${config.name}` }),
  });

  beforeEach(() => {
    registry = new AdapterRegistry<FakeConfig, FakeAdapter>();
  });

  describe('register', () => {
    it('should register a factory', () => {
      registry.register('alpha', createFactory('alpha'));

      expect(registry.size).toBe(1);
      expect(registry.has('alpha')).toBe(true);
    });

    it('should throw if the framework is already registered', () => {
      registry.register('alpha', createFactory('first'));

      expect(() => registry.register('alpha', createFactory('second'))).toThrow(
        "Framework 'alpha' is already registered"
      );
      expect(registry.resolve('alpha').createClient({ name: 'x' }, silentLogger).label).toBe('first:x');
    });

    it('should replace a registration when override is set', () => {
      registry.register('alpha', createFactory('first'));
      registry.register('alpha', createFactory('second'), { override: true });

      expect(registry.size).toBe(1);
      expect(registry.resolve('alpha').createClient({ name: 'x' }, silentLogger).label).toBe('second:x');
    });

    it('should reject an empty identifier', () => {
      expect(() => registry.register('', createFactory('empty'))).toThrow(
        'Framework identifier must be a non-empty string'
      );
    });
  });

  describe('resolve', () => {
    it('should return the registered factory without constructing an adapter', () => {
      const createClient = vi.fn((config: FakeConfig) => ({ label: config.name }));
      const factory: AdapterFactory<FakeConfig, FakeAdapter> = { createClient };
      registry.register('alpha', factory);

      expect(registry.resolve('alpha')).toBe(factory);
      expect(createClient).not.toHaveBeenCalled();
    });

    it('should throw UnsupportedFrameworkError listing registered frameworks', () => {
      registry.register('alpha', createFactory('alpha'));
      registry.register('beta', createFactory('beta'));

      expect(() => registry.resolve('gamma')).toThrow(UnsupportedFrameworkError);
      expect(() => registry.resolve('gamma')).toThrow("Unsupported framework 'gamma'. Registered: alpha, beta");
    });

    it('should omit the hint when nothing is registered', () => {
      expect(() => registry.resolve('gamma')).toThrow("Unsupported framework 'gamma'");

      try {
        registry.resolve('gamma');
      } catch (error) {
        expect(error).toBeInstanceOf(UnsupportedFrameworkError);
        if (error instanceof UnsupportedFrameworkError) {
          expect(error.message).toBe("Unsupported framework 'gamma'");
          expect(error.code).toBe('UNSUPPORTED_FRAMEWORK');
          expect(error.available).toEqual([]);
        }
      }
    });
  });

  describe('listFrameworks', () => {
    it('should list identifiers in registration order', () => {
      registry.register('beta', createFactory('beta'));
      registry.register('alpha', createFactory('alpha'));

      expect(registry.listFrameworks()).toEqual(['beta', 'alpha']);
    });
  });

  describe('unregister', () => {
    it('should remove a registration', () => {
      registry.register('alpha', createFactory('alpha'));

      expect(registry.unregister('alpha')).toBe(true);
      expect(registry.has('alpha')).toBe(false);
    });

    it('should return false for an unknown framework', () => {
      expect(registry.unregister('missing')).toBe(false);
    });
  });

  describe('clear', () => {
    it('should remove every registration', () => {
      registry.register('alpha', createFactory('alpha'));
      registry.register('beta', createFactory('beta'));

      registry.clear();

      expect(registry.size).toBe(0);
    });
  });
});
