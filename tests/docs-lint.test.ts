import { describe, it, expect } from 'vitest';
import { lintMarkdown } from '../src/docs-lint';

describe('lintMarkdown', () => {
  it('accepts valid YAML and JSON blocks and ignores other languages', () => {
    const text = [
      '# Setup',
      '',
      '```yaml',
      'services:',
      '  web:',
      '    image: nginx',
      '```',
      '',
      '```json',
      '{ "name": "media" }',
      '```',
      '',
      '```sh',
      'echo "not: [checked"',
      '```',
    ].join('\n');

    expect(lintMarkdown(text)).toEqual([]);
  });

  it('reports the opening line of a broken block', () => {
    const text = [
      'Intro',
      '',
      '```json',
      '{ "name": "media", }',
      '```',
      '',
      '~~~YAML',
      'services: [web',
      '~~~',
    ].join('\n');

    const issues = lintMarkdown(text);

    expect(issues.map(issue => [ issue.line, issue.language ])).toEqual([
      [ 3, 'json' ],
      [ 7, 'yaml' ],
    ]);
    expect(issues.every(issue => issue.message.length > 0)).toBe(true);
  });

  it('does not close a long fence with a shorter one', () => {
    const text = [
      '````yaml',
      'example: |',
      '  ```',
      '  nested',
      '  ```',
      '````',
    ].join('\n');

    expect(lintMarkdown(text)).toEqual([]);
  });

  it('reports a fence that is never closed', () => {
    const text = [ 'Intro', '```yml', 'key: value' ].join('\n');

    expect(lintMarkdown(text)).toEqual([ { line: 2, language: 'yml', message: 'code fence is never closed' } ]);
  });
});
