import { HomestackError } from '../errors';

export type Environment = Record<string, string | undefined>;

export class InterpolationError extends HomestackError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'InterpolationError';
    this.variable = variable;
  }
}

export interface InterpolationResult {
  value: string;
  /** Variables referenced without a default that had no value. */
  unset: string[];
}

const REFERENCE = /\$(?:(\$)|\{([^}]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;
const BRACED = /^([A-Za-z_][A-Za-z0-9_]*)(?:(:-|-|:\?|\?)([\s\S]*))?$/;

/**
 * Substitute `$VAR`, `${VAR}`, `${VAR:-default}`, `${VAR-default}`,
 * `${VAR:?message}` and `${VAR?message}` in a string. `$$` is a literal `$`.
 *
 * The `:` forms treat an empty value like an unset one.
 */
export const interpolate = (input: string, env: Environment): InterpolationResult => {
  const unset: string[] = [];

  const value = input.replace(REFERENCE, (whole, dollar: string | undefined, braced: string | undefined, bare: string | undefined) => {
    if (dollar) return '$';

    if (bare) {
      const found = env[bare];
      if (found === undefined) unset.push(bare);
      return found ?? '';
    }

    const match = BRACED.exec(braced ?? '');
    if (!match) {
      throw new InterpolationError(braced ?? '', `invalid interpolation format "${whole}"`);
    }

    const [ , name, operator, argument = '' ] = match;
    const found = env[name];
    const missing = operator?.startsWith(':') ? !found : found === undefined;

    switch (operator) {
      case ':-':
      case '-':
        return missing ? argument : found ?? '';
      case ':?':
      case '?':
        if (missing) {
          throw new InterpolationError(name, argument || `required variable ${name} is missing a value`);
        }
        return found ?? '';
      default:
        if (found === undefined) unset.push(name);
        return found ?? '';
    }
  });

  return { value, unset };
};
