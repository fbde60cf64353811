import { NetworkInUseError, NetworkNotFoundError, RuntimeError, VolumeNotFoundError } from './errors';
import logger from './logger';
import type { NetworkSpec, VolumeSpec } from './config/types';
import { LABELS } from './runtime/types';
import type { ContainerRuntime, NetworkInfo } from './runtime/types';

/**
 * Runtime name of a declared network or volume. External ones keep the
 * name they were declared with; the rest are prefixed with the project.
 */
export const scopedName = (project: string, resource: { name: string; external: boolean }): string =>
  resource.external ? resource.name : `${project}_${resource.name}`;

/**
 * Creates and removes the isolated networks a stack declares.
 *
 * Every service group gets its own bridge network named `<project>_<network>`.
 * Containers only reach each other across a network they share; `internal`
 * networks have no route out of the host.
 */
export class NetworkManager {
  private readonly runtime: ContainerRuntime;

  constructor(runtime: ContainerRuntime) {
    this.runtime = runtime;
  }

  /**
   * Ensure every given network exists. Safe to call repeatedly.
   * Returns declared name -> runtime name.
   */
  async ensureNetworks(project: string, networks: NetworkSpec[]): Promise<Record<string, string>> {
    const names: Record<string, string> = {};

    for (const network of networks) {
      const runtimeName = scopedName(project, network);
      names[network.name] = runtimeName;

      if (network.external) {
        const existing = await this.runtime.findNetwork(runtimeName);
        if (!existing) throw new NetworkNotFoundError(runtimeName);
        continue;
      }

      await this.ensureNetwork(project, network, runtimeName);
    }

    return names;
  }

  /**
   * Remove every network labelled with the project.
   * Throws if one still has containers attached.
   */
  async removeNetworks(project: string): Promise<string[]> {
    const networks = await this.runtime.listNetworks({ [LABELS.project]: project });
    const removed: string[] = [];

    for (const network of networks.sort((a, b) => a.name.localeCompare(b.name))) {
      if (network.containerCount > 0) {
        throw new NetworkInUseError(network.name, network.containerCount);
      }
      await this.runtime.removeNetwork(network.name);
      logger.info({ network: network.name }, 'Removed network');
      removed.push(network.name);
    }

    return removed;
  }

  private async ensureNetwork(project: string, network: NetworkSpec, runtimeName: string): Promise<NetworkInfo> {
    const existing = await this.runtime.findNetwork(runtimeName);
    if (existing) {
      if (existing.labels[LABELS.project] !== project) {
        logger.warn({ network: runtimeName }, 'Network exists but is not managed by this project, using it anyway');
      }
      logger.debug({ network: runtimeName }, 'Network already exists');
      return existing;
    }

    try {
      const created = await this.runtime.createNetwork({
        name: runtimeName,
        driver: network.driver,
        internal: network.internal,
        labels: {
          [LABELS.project]: project,
          [LABELS.network]: network.name,
        },
      });
      logger.info({ network: runtimeName, id: created.id, internal: network.internal }, 'Created network');
      return created;
    } catch (err) {
      // Another process created it between our lookup and the create (409 Conflict)
      if (err instanceof RuntimeError && err.statusCode === 409) {
        const raced = await this.runtime.findNetwork(runtimeName);
        if (raced) {
          logger.info({ network: runtimeName }, 'Network was created concurrently, using existing');
          return raced;
        }
      }
      throw err;
    }
  }
}

/**
 * Same lifecycle for named volumes: `<project>_<volume>`, external ones
 * must already exist.
 */
export class VolumeManager {
  private readonly runtime: ContainerRuntime;

  constructor(runtime: ContainerRuntime) {
    this.runtime = runtime;
  }

  async ensureVolumes(project: string, volumes: VolumeSpec[]): Promise<Record<string, string>> {
    const names: Record<string, string> = {};

    for (const volume of volumes) {
      const runtimeName = scopedName(project, volume);
      names[volume.name] = runtimeName;

      const existing = await this.runtime.findVolume(runtimeName);
      if (existing) continue;
      if (volume.external) throw new VolumeNotFoundError(runtimeName);

      await this.runtime.createVolume({
        name: runtimeName,
        driver: volume.driver,
        labels: {
          [LABELS.project]: project,
          [LABELS.volume]: volume.name,
        },
      });
      logger.info({ volume: runtimeName }, 'Created volume');
    }

    return names;
  }

  async removeVolumes(project: string): Promise<string[]> {
    const volumes = await this.runtime.listVolumes({ [LABELS.project]: project });
    const removed: string[] = [];

    for (const volume of volumes.sort((a, b) => a.name.localeCompare(b.name))) {
      await this.runtime.removeVolume(volume.name);
      logger.info({ volume: volume.name }, 'Removed volume');
      removed.push(volume.name);
    }

    return removed;
  }
}
