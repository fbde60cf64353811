import { z } from 'zod';

/**
 * Shape of a stack file as written by hand, before normalization.
 * Short syntax stays as strings here; the loader expands it.
 */

const scalar = z.union([ z.string(), z.number(), z.boolean(), z.null() ]);

/** `{ KEY: value }` or `["KEY=value"]`. */
const keyValues = z.union([ z.record(z.string(), scalar), z.array(z.string()) ]);

const duration = z.union([ z.string(), z.number().nonnegative() ]);

export const dependencyConditionSchema = z.enum([
  'service_started',
  'service_healthy',
  'service_completed_successfully',
]);

const buildSchema = z.union([
  z.string().min(1),
  z.object({
    context: z.string().min(1).default('.'),
    dockerfile: z.string().min(1).optional(),
    args: keyValues.optional(),
  }).strict(),
]);

const healthcheckSchema = z.object({
  test: z.union([ z.string().min(1), z.array(z.string()).min(1) ]).optional(),
  interval: duration.optional(),
  timeout: duration.optional(),
  retries: z.number().int().min(0).optional(),
  start_period: duration.optional(),
  disable: z.boolean().optional(),
}).strict();

export const rawServiceSchema = z.object({
  image: z.string().min(1).optional(),
  build: buildSchema.optional(),
  command: z.union([ z.string(), z.array(z.string()) ]).optional(),
  environment: keyValues.optional(),
  env_file: z.union([ z.string().min(1), z.array(z.string().min(1)) ]).optional(),
  ports: z.array(z.union([ z.string(), z.number().int() ])).optional(),
  volumes: z.array(z.string()).optional(),
  networks: z.array(z.string().min(1)).optional(),
  depends_on: z.union([
    z.array(z.string().min(1)),
    z.record(z.string(), z.object({ condition: dependencyConditionSchema.default('service_started') }).strict()),
  ]).optional(),
  healthcheck: healthcheckSchema.optional(),
  restart: z.string().optional(),
  secrets: z.array(z.string().min(1)).optional(),
  labels: keyValues.optional(),
  stop_grace_period: duration.optional(),
}).strict();

const rawNetworkSchema = z.object({
  driver: z.string().min(1).optional(),
  internal: z.boolean().optional(),
  external: z.boolean().optional(),
}).strict();

const rawVolumeSchema = z.object({
  driver: z.string().min(1).optional(),
  external: z.boolean().optional(),
}).strict();

const rawSecretSchema = z.object({
  file: z.string().min(1),
}).strict();

const rawProxySchema = z.object({
  listen: z.number().int().min(1).max(65535).optional(),
  server_name: z.string().min(1),
  root: z.string().min(1).optional(),
  routes: z.array(z.object({
    path: z.string().startsWith('/'),
    service: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    websocket: z.boolean().optional(),
  }).strict()).default([]),
}).strict();

const rawBackupSchema = z.object({
  paths: z.array(z.string().min(1)).min(1),
  destination: z.string().min(1),
  keep: z.number().int().min(1).optional(),
}).strict();

export const rawStackSchema = z.object({
  name: z.string().min(1).optional(),
  // Accepted and ignored, as in compose files.
  version: z.union([ z.string(), z.number() ]).optional(),
  services: z.record(z.string(), rawServiceSchema),
  networks: z.record(z.string(), rawNetworkSchema.nullable()).optional(),
  volumes: z.record(z.string(), rawVolumeSchema.nullable()).optional(),
  secrets: z.record(z.string(), rawSecretSchema).optional(),
  proxy: rawProxySchema.optional(),
  backup: rawBackupSchema.optional(),
}).strict();

export type RawService = z.infer<typeof rawServiceSchema>;
export type RawStack = z.infer<typeof rawStackSchema>;
export type KeyValues = z.infer<typeof keyValues>;
