import type { ProxyRoute, Stack } from './config/types';
import { HomestackError } from './errors';

const INDENT = '    ';

const routeBlock = (route: ProxyRoute): string[] => {
  const lines = [
    `location ${route.path} {`,
    `${INDENT}proxy_pass http://${route.service}:${route.port};`,
    `${INDENT}proxy_set_header Host $host;`,
    `${INDENT}proxy_set_header X-Real-IP $remote_addr;`,
    `${INDENT}proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;`,
    `${INDENT}proxy_set_header X-Forwarded-Proto $scheme;`,
  ];

  if (route.websocket) {
    lines.push(
      `${INDENT}proxy_http_version 1.1;`,
      `${INDENT}proxy_set_header Upgrade $http_upgrade;`,
      `${INDENT}proxy_set_header Connection "upgrade";`
    );
  }

  lines.push('}');
  return lines;
};

/**
 * Render an nginx `server` block for the stack's `proxy` section.
 *
 * Longer paths come first so the most specific location reads first;
 * nginx picks the longest prefix match regardless.
 */
export const renderProxyConfig = (stack: Stack): string => {
  const proxy = stack.proxy;
  if (!proxy) {
    throw new HomestackError(`Stack ${stack.file} has no proxy section`);
  }

  const routes = [ ...proxy.routes ].sort((a, b) => b.path.length - a.path.length || a.path.localeCompare(b.path));

  const body: string[] = [
    `listen ${proxy.listen};`,
    `server_name ${proxy.serverName};`,
  ];

  if (proxy.root) {
    body.push('', `root ${proxy.root};`, 'index index.html;');
  }

  for (const route of routes) {
    body.push('', ...routeBlock(route));
  }

  if (proxy.root && !routes.some(route => route.path === '/')) {
    body.push('', 'location / {', `${INDENT}try_files $uri $uri/ =404;`, '}');
  }

  const indented = body.map(line => (line ? `${INDENT}${line}` : line));

  return [
    `# Generated by homestack for project ${stack.project}`,
    'server {',
    ...indented,
    '}',
    '',
  ].join('\n');
};
