import os from 'node:os';
import path from 'node:path';
import { HomestackError } from '../errors';
import type { PortMapping, Protocol, RestartPolicy, VolumeMount } from './types';

/**
 * Raised by the short-syntax parsers. The loader turns it into a config issue.
 */
export class ParseError extends HomestackError {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

const DURATION_UNITS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1000,
  ms: 1,
  us: 0.001,
};

/**
 * Parse a duration such as `1m30s`, `500ms` or `10` (seconds) into milliseconds.
 */
export const parseDuration = (input: string | number): number => {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 0) {
      throw new ParseError(`invalid duration "${input}"`);
    }
    return Math.round(input * 1000);
  }

  const trimmed = input.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|us|h|m|s)/gy;
  let total = 0;
  let consumed = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(trimmed)) !== null) {
    total += Number(match[1]) * DURATION_UNITS[match[2]];
    consumed = pattern.lastIndex;
  }

  if (trimmed === '' || consumed !== trimmed.length) {
    throw new ParseError(`invalid duration "${input}"`);
  }

  return Math.round(total);
};

/**
 * Inverse of parseDuration, for rendering. 90000 -> `1m30s`.
 */
export const formatDuration = (ms: number): string => {
  if (ms === 0) return '0s';

  let rest = ms;
  let out = '';
  for (const unit of ['h', 'm', 's', 'ms']) {
    const size = DURATION_UNITS[unit];
    const count = Math.floor(rest / size);
    if (count > 0) {
      out += `${count}${unit}`;
      rest -= count * size;
    }
  }
  return out;
};

const parsePortNumber = (value: string, spec: string): number => {
  if (value.includes('-')) {
    throw new ParseError(`port ranges are not supported ("${spec}")`);
  }
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`invalid port "${value}" in "${spec}"`);
  }
  const port = Number(value);
  if (port < 1 || port > 65535) {
    throw new ParseError(`port ${port} is out of range in "${spec}"`);
  }
  return port;
};

/**
 * Parse a port in short syntax: `80`, `8080:80`, `127.0.0.1:8080:80`,
 * `127.0.0.1::80` or any of those with a `/udp` suffix.
 */
export const parsePort = (input: string | number): PortMapping => {
  const spec = String(input);
  const [ addresses, protocolPart, ...extra ] = spec.split('/');

  let protocol: Protocol = 'tcp';
  if (protocolPart !== undefined) {
    if (extra.length > 0) {
      throw new ParseError(`invalid protocol in "${spec}"`);
    }
    if (protocolPart === 'tcp' || protocolPart === 'udp') {
      protocol = protocolPart;
    } else {
      throw new ParseError(`invalid protocol in "${spec}"`);
    }
  }

  const parts = addresses.split(':');

  if (parts.length === 1) {
    return { containerPort: parsePortNumber(parts[0], spec), protocol };
  }

  if (parts.length === 2) {
    return {
      hostPort: parsePortNumber(parts[0], spec),
      containerPort: parsePortNumber(parts[1], spec),
      protocol,
    };
  }

  if (parts.length === 3) {
    const [ hostIp, hostPort, containerPort ] = parts;
    if (!hostIp) {
      throw new ParseError(`missing host address in "${spec}"`);
    }
    return {
      hostIp,
      hostPort: hostPort === '' ? undefined : parsePortNumber(hostPort, spec),
      containerPort: parsePortNumber(containerPort, spec),
      protocol,
    };
  }

  throw new ParseError(`invalid port mapping "${spec}"`);
};

export const formatPort = (port: PortMapping): string => {
  const host = port.hostIp !== undefined
    ? `${port.hostIp}:${port.hostPort ?? ''}:`
    : port.hostPort !== undefined ? `${port.hostPort}:` : '';
  return `${host}${port.containerPort}/${port.protocol}`;
};

const isBindSource = (source: string): boolean =>
  source.startsWith('.') || source.startsWith('/') || source.startsWith('~');

/**
 * Parse a mount in short syntax: `source:target[:ro|rw]`.
 * Sources that look like paths are bind mounts resolved against `baseDir`;
 * anything else names a declared volume.
 */
export const parseVolume = (spec: string, baseDir: string): VolumeMount => {
  const parts = spec.split(':');

  if (parts.length === 1) {
    throw new ParseError(`anonymous volumes are not supported ("${spec}"); give the volume a name`);
  }
  if (parts.length > 3) {
    throw new ParseError(`invalid volume "${spec}"`);
  }

  const [ source, target, mode ] = parts;
  if (!source || !target) {
    throw new ParseError(`invalid volume "${spec}"`);
  }
  if (!target.startsWith('/')) {
    throw new ParseError(`mount target must be an absolute path in "${spec}"`);
  }
  if (mode !== undefined && mode !== 'ro' && mode !== 'rw') {
    throw new ParseError(`unsupported mount mode "${mode}" in "${spec}"`);
  }

  const readOnly = mode === 'ro';

  if (isBindSource(source)) {
    const expanded = source.startsWith('~') ? path.join(os.homedir(), source.slice(1)) : source;
    return { type: 'bind', source: path.resolve(baseDir, expanded), target, readOnly };
  }

  return { type: 'volume', source, target, readOnly };
};

/**
 * Parse a restart policy keyword. Only `on-failure` takes a retry limit.
 */
export const parseRestartPolicy = (input: string): RestartPolicy => {
  const match = /^(no|always|unless-stopped|on-failure)(?::(\d+))?$/.exec(input.trim());
  if (!match) {
    throw new ParseError(`invalid restart policy "${input}"`);
  }

  const [ , name, retries ] = match;
  if (name === 'on-failure') {
    return retries === undefined ? { name } : { name, maxRetries: Number(retries) };
  }
  if (retries !== undefined) {
    throw new ParseError(`restart policy "${name}" does not take a retry count`);
  }
  if (name === 'no' || name === 'always' || name === 'unless-stopped') {
    return { name };
  }
  throw new ParseError(`invalid restart policy "${input}"`);
};

export const formatRestartPolicy = (policy: RestartPolicy): string =>
  policy.name === 'on-failure' && policy.maxRetries !== undefined
    ? `on-failure:${policy.maxRetries}`
    : policy.name;

/**
 * Split a command string into words the way a POSIX shell would,
 * honouring single quotes, double quotes and backslash escapes.
 * No expansion happens.
 */
export const splitCommand = (command: string): string[] => {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '\'' | '"' | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];

    if (quote === '\'') {
      if (ch === '\'') quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && i + 1 < command.length && '"\\$`'.includes(command[i + 1])) {
        current += command[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '\'' || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < command.length) {
      current += command[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new ParseError(`unterminated quote in command "${command}"`);
  }
  if (inWord) words.push(current);

  return words;
};
