import { DependencyCycleError, ServiceNotFoundError, UnknownDependencyError } from './errors';
import type { ServiceSpec } from './config/types';

/**
 * The part of a stack the resolver looks at.
 */
export interface DependencyGraph {
  services: Record<string, Pick<ServiceSpec, 'dependsOn'>>;
}

const dependenciesOf = (graph: DependencyGraph, name: string): string[] => {
  const service = graph.services[name];
  if (!service) throw new ServiceNotFoundError(name);

  const dependencies = Object.keys(service.dependsOn);
  for (const dependency of dependencies) {
    if (!graph.services[dependency]) {
      throw new UnknownDependencyError(name, dependency);
    }
  }
  return dependencies;
};

/**
 * Close a selection of services over their transitive dependencies.
 */
export const withDependencies = (graph: DependencyGraph, names: string[]): string[] => {
  const selected = new Set<string>();
  const queue = [ ...names ];

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined || selected.has(name)) continue;
    selected.add(name);
    queue.push(...dependenciesOf(graph, name));
  }

  return [ ...selected ].sort();
};

/**
 * Services that depend on `name`, directly or through others.
 */
export const dependentsOf = (graph: DependencyGraph, name: string): string[] => {
  if (!graph.services[name]) throw new ServiceNotFoundError(name);

  const found = new Set<string>();
  const queue = [ name ];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) continue;

    for (const [ candidate, service ] of Object.entries(graph.services)) {
      if (current in service.dependsOn && !found.has(candidate)) {
        found.add(candidate);
        queue.push(candidate);
      }
    }
  }

  found.delete(name);
  return [ ...found ].sort();
};

const findCycle = (graph: DependencyGraph, remaining: Set<string>): string[] => {
  const visited = new Set<string>();

  const visit = (name: string, trail: string[]): string[] | null => {
    const seenAt = trail.indexOf(name);
    if (seenAt !== -1) return [ ...trail.slice(seenAt), name ];
    if (visited.has(name)) return null;
    visited.add(name);

    for (const dependency of Object.keys(graph.services[name]?.dependsOn ?? {}).sort()) {
      if (!remaining.has(dependency)) continue;
      const cycle = visit(dependency, [ ...trail, name ]);
      if (cycle) return cycle;
    }
    return null;
  };

  for (const name of [ ...remaining ].sort()) {
    const cycle = visit(name, []);
    if (cycle) return cycle;
  }
  return [ ...remaining ].sort();
};

/**
 * Group services into startup layers. Every service's dependencies sit in
 * earlier layers; names are sorted inside a layer.
 *
 * With `selection`, only those services and what they depend on are placed.
 */
export const resolveLayers = (graph: DependencyGraph, selection?: string[]): string[][] => {
  const names = selection ? withDependencies(graph, selection) : Object.keys(graph.services).sort();
  const remaining = new Set(names);
  const placed = new Set<string>();
  const layers: string[][] = [];

  for (const name of names) dependenciesOf(graph, name);

  while (remaining.size > 0) {
    const layer = [ ...remaining ]
      .filter(name => dependenciesOf(graph, name).every(dependency => placed.has(dependency)))
      .sort();

    if (layer.length === 0) {
      throw new DependencyCycleError(findCycle(graph, remaining));
    }

    for (const name of layer) {
      remaining.delete(name);
      placed.add(name);
    }
    layers.push(layer);
  }

  return layers;
};

export const startupOrder = (graph: DependencyGraph, selection?: string[]): string[] =>
  resolveLayers(graph, selection).flat();

export const shutdownOrder = (graph: DependencyGraph, selection?: string[]): string[] =>
  startupOrder(graph, selection).reverse();
