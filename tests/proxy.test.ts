import { describe, it, expect } from 'vitest';
import { renderProxyConfig } from '../src/proxy';
import { stackFrom } from './helpers/stack';

const services = [
  'services:',
  '  api:',
  '    image: example/api:2',
  '  jellyfin:',
  '    image: jellyfin/jellyfin',
];

const HEADERS = [
  '        proxy_set_header Host $host;',
  '        proxy_set_header X-Real-IP $remote_addr;',
  '        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
  '        proxy_set_header X-Forwarded-Proto $scheme;',
];

describe('renderProxyConfig', () => {
  it('renders one location per route, most specific first', () => {
    const stack = stackFrom([
      'name: media',
      ...services,
      'proxy:',
      '  listen: 8080',
      '  server_name: home.example.test',
      '  root: /srv/www',
      '  routes:',
      '    - path: /api',
      '      service: api',
      '      port: 8000',
      '    - path: /jellyfin',
      '      service: jellyfin',
      '      port: 8096',
      '      websocket: true',
    ]);

    expect(renderProxyConfig(stack)).toBe([
      '# Generated by homestack for project media',
      'server {',
      '    listen 8080;',
      '    server_name home.example.test;',
      '',
      '    root /srv/www;',
      '    index index.html;',
      '',
      '    location /jellyfin {',
      '        proxy_pass http://jellyfin:8096;',
      ...HEADERS,
      '        proxy_http_version 1.1;',
      '        proxy_set_header Upgrade $http_upgrade;',
      '        proxy_set_header Connection "upgrade";',
      '    }',
      '',
      '    location /api {',
      '        proxy_pass http://api:8000;',
      ...HEADERS,
      '    }',
      '',
      '    location / {',
      '        try_files $uri $uri/ =404;',
      '    }',
      '}',
      '',
    ].join('\n'));
  });

  it('lets a route own / and listens on 80 by default', () => {
    const stack = stackFrom([
      'name: media',
      ...services,
      'proxy:',
      '  server_name: home.example.test',
      '  routes:',
      '    - path: /',
      '      service: jellyfin',
      '      port: 8096',
    ]);

    expect(renderProxyConfig(stack).split('\n')).toEqual([
      '# Generated by homestack for project media',
      'server {',
      '    listen 80;',
      '    server_name home.example.test;',
      '',
      '    location / {',
      '        proxy_pass http://jellyfin:8096;',
      ...HEADERS,
      '    }',
      '}',
      '',
    ]);
  });

  it('fails without a proxy section', () => {
    expect(() => renderProxyConfig(stackFrom([ 'name: media', ...services ])))
      .toThrow('Stack /srv/media/homestack.yaml has no proxy section');
  });
});
