import { describe, it, expect } from 'vitest';
import { interpolate, InterpolationError } from '../src/config/interpolate';

describe('interpolate', () => {
  it('substitutes bare and braced references', () => {
    const result = interpolate('$HOST:${PORT}', { HOST: 'db', PORT: '5432' });

    expect(result).toEqual({ value: 'db:5432', unset: [] });
  });

  it('treats $$ as a literal dollar', () => {
    expect(interpolate('cost: $$5 and $$HOME', {}).value).toBe('cost: $5 and $HOME');
  });

  it('reports unset variables and substitutes an empty string', () => {
    const result = interpolate('$MISSING/data/${ALSO_MISSING}', {});

    expect(result).toEqual({ value: '/data/', unset: [ 'MISSING', 'ALSO_MISSING' ] });
  });

  describe('defaults', () => {
    it('uses :- default when unset or empty', () => {
      expect(interpolate('${TAG:-latest}', {}).value).toBe('latest');
      expect(interpolate('${TAG:-latest}', { TAG: '' }).value).toBe('latest');
      expect(interpolate('${TAG:-latest}', { TAG: '1.4' }).value).toBe('1.4');
    });

    it('uses - default only when unset', () => {
      expect(interpolate('${TAG-latest}', {}).value).toBe('latest');
      expect(interpolate('${TAG-latest}', { TAG: '' }).value).toBe('');
    });

    it('does not report a variable with a default as unset', () => {
      expect(interpolate('${TAG:-latest}', {}).unset).toEqual([]);
    });

    it('keeps colons and slashes inside the default', () => {
      expect(interpolate('${URL:-http://localhost:8080/api}', {}).value).toBe('http://localhost:8080/api');
    });
  });

  describe('required variables', () => {
    it('throws the given message when a :? variable is unset or empty', () => {
      expect(() => interpolate('${TOKEN:?token is required}', { TOKEN: '' })).toThrow('token is required');
    });

    it('accepts an empty value for ? variables', () => {
      expect(interpolate('${TOKEN?}', { TOKEN: '' }).value).toBe('');
    });

    it('falls back to a generic message', () => {
      let caught: unknown;
      try {
        interpolate('${TOKEN?}', {});
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(InterpolationError);
      expect(caught).toMatchObject({
        variable: 'TOKEN',
        message: 'required variable TOKEN is missing a value',
      });
    });
  });

  it('rejects malformed braced references', () => {
    expect(() => interpolate('${1BAD}', {})).toThrow('invalid interpolation format "${1BAD}"');
    expect(() => interpolate('${}', {})).toThrow('invalid interpolation format "${}"');
  });

  it('leaves a lone dollar sign alone', () => {
    expect(interpolate('price $ 5', {}).value).toBe('price $ 5');
  });
});
