import type Docker from 'dockerode';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { RuntimeError } from '../src/errors';
import { DockerRuntime, demuxLogs } from '../src/runtime/docker';

const engineError = (message: string, statusCode: number): Error => Object.assign(new Error(message), { statusCode });

describe('DockerRuntime', () => {
  const image = { inspect: vi.fn() };
  const container = { start: vi.fn(), stop: vi.fn(), inspect: vi.fn(), remove: vi.fn() };
  const network = { connect: vi.fn() };
  const volume = { inspect: vi.fn() };
  const docker = {
    getImage: vi.fn(() => image),
    getContainer: vi.fn(() => container),
    getNetwork: vi.fn(() => network),
    getVolume: vi.fn(() => volume),
    createContainer: vi.fn(),
    listContainers: vi.fn(),
  };
  let runtime: DockerRuntime;

  beforeEach(() => {
    vi.clearAllMocks();
    docker.getImage.mockReturnValue(image);
    docker.getContainer.mockReturnValue(container);
    docker.getNetwork.mockReturnValue(network);
    docker.getVolume.mockReturnValue(volume);
    runtime = new DockerRuntime(docker as unknown as Docker);
  });

  it('reports missing images and volumes instead of failing', async () => {
    image.inspect.mockRejectedValueOnce(engineError('no such image', 404));
    volume.inspect.mockRejectedValueOnce(engineError('no such volume', 404));

    await expect(runtime.hasImage('nginx:1.27')).resolves.toBe(false);
    await expect(runtime.findVolume('media_data')).resolves.toBeNull();
  });

  it('translates a container spec into an engine request', async () => {
    docker.createContainer.mockResolvedValueOnce({ id: 'abc' });
    network.connect.mockResolvedValueOnce(undefined);

    const id = await runtime.createContainer({
      name: 'media-api-1',
      image: 'example/api:2',
      command: [ 'serve', '--port', '8000' ],
      env: { PORT: '8000' },
      labels: { 'homestack.project': 'media' },
      ports: [
        { hostPort: 8080, containerPort: 80, protocol: 'tcp' },
        { containerPort: 53, protocol: 'udp' },
      ],
      binds: [ 'media_data:/data' ],
      networks: [ { name: 'media_front', aliases: [ 'api' ] }, { name: 'media_back', aliases: [ 'api' ] } ],
      healthcheck: { test: [ 'CMD', 'true' ], intervalMs: 1000, timeoutMs: 500, retries: 3, startPeriodMs: 0 },
      stopTimeoutSeconds: 15,
    });

    expect(id).toBe('abc');
    expect(docker.createContainer).toHaveBeenCalledWith({
      name: 'media-api-1',
      Image: 'example/api:2',
      Cmd: [ 'serve', '--port', '8000' ],
      Env: [ 'PORT=8000' ],
      Labels: { 'homestack.project': 'media' },
      ExposedPorts: { '80/tcp': {}, '53/udp': {} },
      StopTimeout: 15,
      Healthcheck: {
        Test: [ 'CMD', 'true' ],
        Interval: 1_000_000_000,
        Timeout: 500_000_000,
        StartPeriod: 0,
        Retries: 3,
      },
      HostConfig: {
        Binds: [ 'media_data:/data' ],
        PortBindings: { '80/tcp': [ { HostIp: '', HostPort: '8080' } ] },
        NetworkMode: 'media_front',
        RestartPolicy: { Name: 'no' },
      },
      NetworkingConfig: { EndpointsConfig: { media_front: { Aliases: [ 'api' ] } } },
    });
    expect(docker.getNetwork).toHaveBeenCalledWith('media_back');
    expect(network.connect).toHaveBeenCalledWith({ Container: 'abc', EndpointConfig: { Aliases: [ 'api' ] } });
  });

  it('removes the container when a secondary network cannot be joined', async () => {
    const created = { id: 'abc', remove: vi.fn().mockResolvedValue(undefined) };
    docker.createContainer.mockResolvedValueOnce(created);
    network.connect.mockRejectedValueOnce(engineError('network media_back not found', 404));

    const creating = runtime.createContainer({
      name: 'media-api-1',
      image: 'example/api:2',
      env: {},
      labels: {},
      ports: [],
      binds: [],
      networks: [ { name: 'media_front', aliases: [ 'api' ] }, { name: 'media_back', aliases: [ 'api' ] } ],
    });

    await expect(creating).rejects.toMatchObject({
      message: 'Failed to create container media-api-1: network media_back not found',
      statusCode: 404,
    });
    expect(created.remove).toHaveBeenCalledWith({ force: true });
  });

  it('treats starting a running container as done', async () => {
    container.start.mockRejectedValueOnce(engineError('container already started', 304));

    await expect(runtime.startContainer('abc')).resolves.toBeUndefined();
  });

  it('wraps engine failures with the status code', async () => {
    container.start.mockRejectedValueOnce(engineError('boom', 500));

    const failure = runtime.startContainer('abc');

    await expect(failure).rejects.toThrow(RuntimeError);
    await expect(failure).rejects.toMatchObject({ message: 'Failed to start container abc: boom', statusCode: 500 });
  });

  it('maps container state', async () => {
    container.inspect.mockResolvedValueOnce({
      Id: 'abc',
      Name: '/media-web-1',
      State: {
        Status: 'running',
        Running: true,
        ExitCode: 0,
        Health: { Status: 'healthy' },
        StartedAt: '2026-01-01T00:00:00Z',
        FinishedAt: '0001-01-01T00:00:00Z',
      },
      Config: { Labels: { 'homestack.service': 'web' } },
    });

    await expect(runtime.inspectContainer('abc')).resolves.toEqual({
      id: 'abc',
      name: 'media-web-1',
      status: 'running',
      labels: { 'homestack.service': 'web' },
      running: true,
      exitCode: 0,
      health: 'healthy',
      startedAt: '2026-01-01T00:00:00Z',
      finishedAt: '0001-01-01T00:00:00Z',
    });
  });

  it('finds a container by its exact name', async () => {
    docker.listContainers.mockResolvedValueOnce([
      { Id: '1', Names: [ '/media-web-10' ], State: 'running', Labels: {} },
      { Id: '2', Names: [ '/media-web-1' ], State: 'exited', Labels: { 'homestack.service': 'web' } },
    ]);

    await expect(runtime.findContainer('media-web-1')).resolves.toEqual({
      id: '2',
      name: 'media-web-1',
      status: 'exited',
      labels: { 'homestack.service': 'web' },
    });
  });
});

describe('demuxLogs', () => {
  const frame = (stream: number, text: string): Buffer => {
    const payload = Buffer.from(text);
    const header = Buffer.alloc(8);
    header.writeUInt8(stream, 0);
    header.writeUInt32BE(payload.length, 4);
    return Buffer.concat([ header, payload ]);
  };

  it('joins stdout and stderr frames', () => {
    expect(demuxLogs(Buffer.concat([ frame(1, 'hello\n'), frame(2, 'oops\n') ]))).toBe('hello\noops\n');
  });

  it('passes unframed output through', () => {
    expect(demuxLogs(Buffer.from('plain output\n'))).toBe('plain output\n');
  });
});
